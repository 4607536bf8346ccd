/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && isString(value.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
