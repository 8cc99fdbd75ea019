export const API_MAX_IDS_PER_REQUEST = 200;

export interface AppConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  maxItemsPerRequest: number;
  apiKey?: string;
  userAgent: string;
}

type Env = Record<string, string | undefined>;

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asText(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function clampItemsPerRequest(value: number): number {
  if (!Number.isFinite(value)) {
    return API_MAX_IDS_PER_REQUEST;
  }
  return Math.max(1, Math.min(Math.floor(value), API_MAX_IDS_PER_REQUEST));
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiBaseUrl = asText(env.GW2_API_BASE_URL) ?? 'https://api.guildwars2.com/v2';

  return {
    apiBaseUrl: apiBaseUrl.replace(/\/+$/, ''),
    requestTimeoutMs: asNumber(env.GW2_REQUEST_TIMEOUT_MS, 30_000),
    maxItemsPerRequest: clampItemsPerRequest(asNumber(env.GW2_ITEMS_PER_REQUEST, API_MAX_IDS_PER_REQUEST)),
    apiKey: asText(env.GW2_API_KEY),
    userAgent: 'gw2-item-finder/0.1.0',
  };
}
