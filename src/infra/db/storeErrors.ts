import { StoreUnavailableError } from '../../application/errors.js';

// Socket-level failures plus pg "admin shutdown" / "too many connections"
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  '57P01',
  '57P02',
  '57P03',
  '53300',
]);

const UNAVAILABLE_MESSAGES = [
  /connection terminated/i,
  /timeout exceeded when trying to connect/i,
  /cannot use a pool after calling end/i,
];

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function isStoreUnavailable(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = errorCode(error);
  // SQLSTATE class 08 is "connection exception"
  if (code !== undefined && (UNAVAILABLE_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code))) {
    return true;
  }
  return UNAVAILABLE_MESSAGES.some((pattern) => pattern.test(error.message));
}

export function isForeignKeyViolation(error: unknown): boolean {
  return error instanceof Error && errorCode(error) === '23503';
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && errorCode(error) === '23505';
}

export function toStoreError(error: unknown): unknown {
  return isStoreUnavailable(error) ? new StoreUnavailableError(undefined, { cause: error }) : error;
}

/**
 * Run a store operation, reporting connectivity failures as StoreUnavailableError.
 */
export async function withStore<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toStoreError(error);
  }
}
