// rubify/debug - Debug logging

let debugEnabled = false;

export function setDebug(value: boolean): void {
  debugEnabled = value;
}

export function isDebug(): boolean {
  return debugEnabled;
}

export function dp(...args: unknown[]): void {
  if (debugEnabled) {
    console.log('[DEBUG]', ...args);
  }
}
