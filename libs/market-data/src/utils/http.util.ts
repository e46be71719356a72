import axios, { AxiosInstance } from 'axios';

export const createHttpClient = (
  baseURL: string,
  timeoutMs: number,
  headers: Record<string, string> = {},
): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { 'User-Agent': 'market-dashboard-bot/1.0', ...headers },
  });

export const describeHttpError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status ? `HTTP ${status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : 'Unknown error';
};
