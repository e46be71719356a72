import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CoinglassDerivativesProvider,
  MarketSnapshot,
  unavailableSnapshot,
} from '@libs/market-data';
import { buildConfigService } from './helpers/config';
import { paramOf, stubHttp } from './helpers/http-stub';
import type { StubbedResponse } from './helpers/http-stub';

const snapshot: MarketSnapshot = {
  ...unavailableSnapshot(),
  quotes: {
    ...unavailableSnapshot().quotes,
    BTC: {
      symbol: 'BTC',
      price: { kind: 'number', value: 65000 },
      change24hPct: { kind: 'number', value: 1.5 },
    },
  },
};

const overview = (symbol: unknown): StubbedResponse => ({
  status: 200,
  data: { success: true, data: { totalVolume: symbol === 'BTC' ? 500_000_000 : 1000, openInterest: '2500' } },
});

const liquidations: StubbedResponse = {
  status: 200,
  data: {
    success: true,
    data: [
      { longLiquidation: 6, shortLiquidation: 4, totalLiquidation: 10 },
      { longLiquidation: 1, shortLiquidation: 1, totalLiquidation: 2 },
    ],
  },
};

describe('coinglass derivatives provider', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports not_configured without any request when the key is empty', async () => {
    const requests = stubHttp(() => ({ status: 200, data: {} }));
    const provider = new CoinglassDerivativesProvider(buildConfigService({ COINGLASS_API_KEY: '  ' }));

    await expect(provider.collect(snapshot)).resolves.toEqual({ status: 'not_configured' });
    expect(provider.isConfigured()).toBe(false);
    expect(requests).toHaveLength(0);
  });

  it('collects overview and liquidations per symbol in order', async () => {
    const requests = stubHttp((config) => {
      if (config.url === '/futures/openInterest') return overview(paramOf(config, 'symbol'));
      if (config.url === '/liquidation/history') return liquidations;
      return undefined;
    });
    const provider = new CoinglassDerivativesProvider(buildConfigService());

    const result = await provider.collect(snapshot);

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.metrics.BTC).toEqual({
      symbol: 'BTC',
      currentPrice: { kind: 'number', value: 65000 },
      change24h: { kind: 'number', value: 1.5 },
      volume24h: { kind: 'number', value: 500_000_000 },
      openInterest: { kind: 'number', value: 2500 },
      longLiquidations24h: { kind: 'number', value: 6 },
      shortLiquidations24h: { kind: 'number', value: 4 },
      totalLiquidations24h: { kind: 'number', value: 10 },
    });
    expect(result.metrics.ETH.currentPrice).toEqual({ kind: 'unavailable' });

    expect(requests.map((request) => `${request.url}?${String(paramOf(request, 'symbol'))}`)).toEqual([
      '/futures/openInterest?BTC',
      '/liquidation/history?BTC',
      '/futures/openInterest?ETH',
      '/liquidation/history?ETH',
      '/futures/openInterest?XRP',
      '/liquidation/history?XRP',
    ]);
    expect(paramOf(requests[1], 'interval')).toBe('h24');
    expect(requests[0].headers.get('coinglassSecret')).toBe('test-secret');
  });

  it('keeps other symbols when one symbol fails', async () => {
    stubHttp((config) => {
      const symbol = paramOf(config, 'symbol');
      if (symbol === 'ETH') return { status: 500, data: {} };
      if (config.url === '/futures/openInterest') return overview(symbol);
      return { status: 200, data: { success: false, data: null } };
    });
    const provider = new CoinglassDerivativesProvider(buildConfigService());

    const result = await provider.collect(snapshot);

    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.metrics.BTC.volume24h).toEqual({ kind: 'number', value: 500_000_000 });
    expect(result.metrics.BTC.totalLiquidations24h).toEqual({ kind: 'unavailable' });
    expect(result.metrics.ETH.volume24h).toEqual({ kind: 'unavailable' });
    expect(result.metrics.XRP.openInterest).toEqual({ kind: 'number', value: 2500 });
  });

  it('reports upstream_error when the overview fails for every symbol', async () => {
    stubHttp((config) =>
      config.url === '/futures/openInterest'
        ? { status: 200, data: { success: false } }
        : liquidations,
    );
    const provider = new CoinglassDerivativesProvider(buildConfigService());

    const result = await provider.collect(snapshot);

    expect(result).toEqual({
      status: 'upstream_error',
      message:
        'BTC: request was not successful; ETH: request was not successful; XRP: request was not successful',
    });
  });
});
