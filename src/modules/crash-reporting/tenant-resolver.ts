import type { HeaderValue, TenantRequest } from './types';
import {
  TENANT_HEADER,
  TENANT_HOST_MARKER,
  TENANT_ID_LENGTH,
  TENANT_QUERY_PARAM,
} from './crash-reporting.constants';

export interface TenantResolverConfig {
  /** Statically configured tenant id */
  boardId?: string;
  /** Reporting endpoint, searched for the host marker as a last resort */
  endpointUrl?: string;
}

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

function firstValue(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  return typeof candidate === 'string' && candidate !== ''
    ? candidate
    : undefined;
}

function queryValue(query: unknown, key: string): string | undefined {
  if (query === null || typeof query !== 'object') {
    return undefined;
  }
  const entry = Object.entries(query).find(([name]) => name === key);
  return firstValue(entry?.[1]);
}

function headerValue(
  headers: Record<string, HeaderValue>,
  name: string,
): string | undefined {
  const match = Object.keys(headers).find(
    (key) => key.toLowerCase() === name,
  );
  if (match === undefined) {
    return undefined;
  }
  // Node joins repeated headers into one "a, b" value
  const joined = firstValue(headers[match]);
  return joined === undefined
    ? undefined
    : firstValue(joined.split(',')[0].trim());
}

/**
 * Finds the first (case-insensitive) occurrence of `marker` in `text` and
 * returns the `length` characters after it when they are all hex digits.
 * Only the first occurrence is examined.
 */
export function extractMarkedHexId(
  text: string | undefined,
  marker: string = TENANT_HOST_MARKER,
  length: number = TENANT_ID_LENGTH,
): string | undefined {
  if (!text) {
    return undefined;
  }
  const index = text.toLowerCase().indexOf(marker.toLowerCase());
  if (index < 0) {
    return undefined;
  }
  const candidate = text.slice(
    index + marker.length,
    index + marker.length + length,
  );
  return candidate.length === length && HEX_PATTERN.test(candidate)
    ? candidate
    : undefined;
}

/**
 * Derives the tenant (board) id for a request. Sources in priority order:
 * query parameter, header, configured id, host name, endpoint URL.
 */
export function resolveTenantId(
  request: TenantRequest,
  config: TenantResolverConfig,
): string | undefined {
  return (
    queryValue(request.query, TENANT_QUERY_PARAM) ??
    headerValue(request.headers, TENANT_HEADER) ??
    firstValue(config.boardId) ??
    extractMarkedHexId(request.host) ??
    extractMarkedHexId(config.endpointUrl)
  );
}
