/** Query parameter carrying the tenant (board) id. */
export const TENANT_QUERY_PARAM = 'boardId';

/** Header carrying the tenant id. Fastify lower-cases header names. */
export const TENANT_HEADER = 'x-board-id';

/** Hosted deployments are named `webapi<24 hex board id>.<domain>`. */
export const TENANT_HOST_MARKER = 'webapi';
export const TENANT_ID_LENGTH = 24;

export const DISPATCH_TIMEOUT_MS = 5000;

export const RECOVERY_TRACE_LIMIT = 8192;
export const STARTUP_TRACE_LIMIT = 4096;

export const GENERIC_FAILURE_MESSAGE =
  'An error occurred while processing your request';
