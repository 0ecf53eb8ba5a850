export type HeaderValue = string | string[] | undefined;

/** The parts of an inbound request the tenant resolver looks at. */
export interface TenantRequest {
  query?: unknown;
  headers: Record<string, HeaderValue>;
  host?: string;
}
