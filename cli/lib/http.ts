import { TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  text: string;
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/json',
};

export function createFetchTransport(options: { timeoutMs: number; userAgent: string }): Transport {
  return async (request) => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: {
          ...DEFAULT_HEADERS,
          'User-Agent': options.userAgent,
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      });

      return {
        status: response.status,
        statusText: response.statusText,
        text: await response.text(),
      };
    } catch (error) {
      throw new TransportError(request.url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  };
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function parseBody(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export function errorReason(response: TransportResponse): string {
  const body = parseBody(response.text);
  if (body && typeof body === 'object' && 'text' in body && typeof body.text === 'string') {
    return body.text;
  }
  if (typeof body === 'string' && body.trim().length > 0) {
    return body.trim();
  }
  return response.statusText || 'Unknown error';
}
