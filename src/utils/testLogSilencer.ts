// Test-only log silencing. The subscription and control helpers log tagged
// lines ([Board], [BoardControl]) that would otherwise flood the test output.
//
// This module should ONLY be imported by the Vitest setup file.

/* eslint-disable no-console */

type ConsoleMethod = (...args: unknown[]) => void;
type ConsoleName = "log" | "info" | "debug" | "warn" | "error";

export function installTestLogSilencer(opts?: {
  keepWarnAndError?: boolean;
  // When set, allow matching messages through even if silenced.
  allow?: RegExp[];
  // Always suppress these messages.
  deny?: RegExp[];
}) {
  if (typeof process === "undefined" || process.env?.NODE_ENV !== "test") return;

  const {
    keepWarnAndError = false,
    allow = [],
    deny = [/^\[Board\]/, /^\[BoardControl\]/, /^### (opened|closed)/],
  } = opts || {};

  const original: Record<ConsoleName, ConsoleMethod> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    debug: console.debug.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const shouldSuppress = (args: unknown[]) => {
    const msg = String(args[0] ?? "");
    if (allow.some((re) => re.test(msg))) return false;
    return deny.some((re) => re.test(msg));
  };

  const wrap = (name: ConsoleName): ConsoleMethod => {
    const fn = original[name];
    return (...args: unknown[]) => {
      if (shouldSuppress(args)) return;
      fn(...args);
    };
  };

  console.log = wrap("log");
  console.info = wrap("info");
  console.debug = wrap("debug");
  if (!keepWarnAndError) {
    console.warn = wrap("warn");
    console.error = wrap("error");
  }
}
