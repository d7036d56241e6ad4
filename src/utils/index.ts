/**
 * Truncate an identifier for display: first 8 chars + "..."
 * Keys double as lookup handles for auth tokens, so logs never carry them whole.
 */
export function formatKey(key: string, len = 8): string {
  if (!key) return '(none)';
  return key.length > len ? `${key.substring(0, len)}...` : key;
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structured log helper with [tag] prefix.
 */
export function log(tag: string, message: string, ...args: unknown[]): void {
  console.log(`[${tag}] ${message}`, ...args);
}

export function logWarn(tag: string, message: string, ...args: unknown[]): void {
  console.warn(`[${tag}] ${message}`, ...args);
}

export function logError(tag: string, message: string, ...args: unknown[]): void {
  console.error(`[${tag}] ${message}`, ...args);
}
