/**
 * Debug logging utility
 * Only logs when NODE_ENV=debug or DELTACODE_DEBUG=1
 */
let isDebug = process.env.NODE_ENV === 'debug' || process.env.DELTACODE_DEBUG === '1';

export function enableDebug(): void {
  isDebug = true;
}

export function isDebugEnabled(): boolean {
  return isDebug;
}

export function debugLog(...args: unknown[]): void {
  if (isDebug) {
    console.log('[DEBUG]', ...args);
  }
}

export function debugError(...args: unknown[]): void {
  if (isDebug) {
    console.error('[DEBUG]', ...args);
  }
}
