import { MANUAL_INPUT_EXAMPLE } from '@libs/market-data';
import type { ReportOutcome } from '../report/report-orchestrator.service';
import type { ManualInputTarget } from './pending-input.store';

export const PERMISSION_DENIED = 'You do not have permission to use this command.';
export const REPORT_STARTED = 'Collecting statistics and building the dashboard for immediate publication...';
export const TEST_STARTED = 'Collecting statistics and building a test dashboard...';
export const MANUAL_INPUT_RECEIVED = 'Got the Coinglass data, processing...';
export const MANUAL_INPUT_EXPIRED = 'This prompt expired. Please request manual input again.';

export const manualInputPrompt = (target: ManualInputTarget): string =>
  [
    target === 'channel'
      ? 'Please enter current Coinglass futures data for BTC, ETH and XRP.'
      : 'Please enter current Coinglass futures data for BTC, ETH and XRP for a test post.',
    'Use the following format for each coin (values may be incomplete, N/A or omitted):',
    '',
    'BTC: TV=X, TL=Y, LL=A, SL=B, OI=C;',
    'ETH: TV=D, TL=E, LL=F, SL=G, OI=H;',
    'XRP: TV=I, TL=J, LL=K, SL=L, OI=M',
    '',
    'TV = total futures volume, TL = total liquidations, LL = long liquidations, SL = short liquidations, OI = open interest.',
    '',
    `Example:\n${MANUAL_INPUT_EXAMPLE}`,
    '',
    "If no data is available, just reply 'N/A'.",
  ].join('\n');

const CHANNEL_OUTCOMES: Record<ReportOutcome['status'], string> = {
  published: 'The dashboard was generated and published to the channel.',
  not_configured: '⚠️ Coinglass API is not connected. Publication cancelled.',
  upstream_error: '❌ Coinglass API error. Publication cancelled, see the logs.',
  delivery_failed: 'The dashboard was generated but could not be published to the channel. See the logs.',
};

const OPERATOR_OUTCOMES: Record<ReportOutcome['status'], string> = {
  published: 'The test dashboard was sent to you.',
  not_configured: '⚠️ Coinglass API is not connected. Test post cancelled.',
  upstream_error: '❌ Coinglass API error. Test post cancelled, see the logs.',
  delivery_failed: 'The test dashboard was generated but could not be sent. See the logs.',
};

export const describeOutcome = (outcome: ReportOutcome, target: ManualInputTarget): string =>
  (target === 'channel' ? CHANNEL_OUTCOMES : OPERATOR_OUTCOMES)[outcome.status];
