export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True for fs errors raised because a path does not exist
 */
export function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
