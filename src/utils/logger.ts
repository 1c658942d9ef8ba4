import { parseFlag } from "./config";

// Debug/info only show with BOARD_DEBUG set; warnings and errors always go to stderr.
let debugOverride: boolean | null = null;

export function setDebug(v: boolean | null) {
  debugOverride = v;
}

export function isDebug(): boolean {
  if (debugOverride !== null) return debugOverride;
  return parseFlag(process.env.BOARD_DEBUG);
}

export function dlog(...args: unknown[]) {
  if (isDebug()) console.debug(...args);
}
export function dinfo(...args: unknown[]) {
  if (isDebug()) console.info(...args);
}
export function dwarn(...args: unknown[]) {
  console.warn(...args);
}
export function derror(...args: unknown[]) {
  console.error(...args);
}
