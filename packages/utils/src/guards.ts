/**
 * Type Guards
 */

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value && typeof value.code === 'string';
}

export function hasErrorCode(value: unknown, ...codes: string[]): boolean {
  return isErrnoException(value) && value.code !== undefined && codes.includes(value.code);
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
