import { ConfigService } from '@nestjs/config';

export type DashboardProvider = 'coingecko' | 'coinglass' | 'fear_greed';

const DEFAULT_BASE_URLS: Record<DashboardProvider, string> = {
  coingecko: 'https://api.coingecko.com/api/v3',
  coinglass: 'https://open-api.coinglass.com/api/pro/v1',
  fear_greed: 'https://api.alternative.me',
};

export const getProviderBaseUrl = (
  configService: ConfigService,
  provider: DashboardProvider,
): string => {
  const override = configService.get<string>(`${provider.toUpperCase()}_BASE_URL`);
  return override?.trim() || DEFAULT_BASE_URLS[provider];
};

/** 0 keeps axios' default of no timeout. */
export const getHttpTimeoutMs = (configService: ConfigService): number => {
  const raw = Number(configService.get<number>('HTTP_TIMEOUT_MS', 0));
  return Number.isFinite(raw) && raw > 0 ? raw : 0;
};
