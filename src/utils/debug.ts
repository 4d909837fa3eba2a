export function debugEnabled(flag?: boolean): boolean {
  if (flag === true) return true;
  const g = globalThis as unknown as { __OCR_LAYOUT_DEBUG__?: boolean };
  if (g.__OCR_LAYOUT_DEBUG__ === true) return true;
  if (typeof process !== 'undefined' && process.env.OCR_LAYOUT_DEBUG === '1') return true;
  return false;
}

export function createDebugLogger(scope: string, flag?: boolean): (...args: unknown[]) => void {
  return (...args: unknown[]): void => {
    if (!debugEnabled(flag)) return;
    console.log(`[${scope}]`, ...args);
  };
}
