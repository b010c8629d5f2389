/** Lifetime of a token when the caller does not pass one. */
export const DEFAULT_TOKEN_TTL_SECONDS = 15 * 60;
/** Lifetime of tokens issued by the login flow, unless ACCESS_TOKEN_TTL_MINUTES overrides it. */
export const DEFAULT_ACCESS_TOKEN_TTL_MINUTES = 30;
export const TOKEN_TYPE = 'bearer';
export const TOKEN_ALGORITHM = 'HS256';

export const DEFAULT_USER_ROLE = 'user';

export const THROTTLE_SHORT_TTL_MS = 1000;
export const THROTTLE_SHORT_LIMIT = 20;
export const THROTTLE_MEDIUM_TTL_MS = 60_000;
export const THROTTLE_MEDIUM_LIMIT = 300;

export const UPLOAD_MAX_FILE_SIZE_BYTES = 25 * 1024 * 1024;

/** Largest value a Postgres `integer` (serial) column holds. */
export const PG_INT4_MAX = 2_147_483_647;
