import type { z } from 'zod';
import { RequestError } from '../lib/errors.js';
import { errorReason, isSuccess, parseBody } from '../lib/http.js';
import type { TransportResponse } from '../lib/http.js';
import type { ApiRequest } from '../lib/batch.js';

export function buildUrl(baseUrl: string, path: string, query: Record<string, string> = {}): string {
  const search = Object.entries(query)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value).replace(/%2C/g, ',')}`)
    .join('&');

  return search.length > 0 ? `${baseUrl}/${path}?${search}` : `${baseUrl}/${path}`;
}

export function decodeResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: TransportResponse,
  url: string,
): T {
  if (!isSuccess(response.status)) {
    throw new RequestError(url, response.status, errorReason(response));
  }

  const parsed = schema.safeParse(parseBody(response.text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new RequestError(url, response.status, `Unexpected response shape${where}: ${issue?.message ?? 'invalid body'}`);
  }

  return parsed.data;
}

export function jsonRequest<T>(options: {
  label: string;
  baseUrl: string;
  path: string;
  query?: Record<string, string>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  onComplete?: (value: T) => void;
}): ApiRequest<T> {
  const url = buildUrl(options.baseUrl, options.path, options.query);

  return {
    label: options.label,
    url,
    method: 'GET',
    parse: (response) => decodeResponse(options.schema, response, url),
    onComplete: options.onComplete,
  };
}
