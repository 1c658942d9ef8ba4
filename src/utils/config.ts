import { lookup } from "node:dns/promises";
import { ConfigError } from "../board/errors";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 3180;
export const DEFAULT_RECONNECT_DELAY_MS = 5000;

export type ReconnectPolicy = {
  delayMs: number;
  // null: keep trying forever
  maxAttempts: number | null;
};

export type BoardConfig = {
  host: string;
  port: number;
  reconnect: ReconnectPolicy;
  debug: boolean;
};

/** CLI flags, already split out of argv. Each one wins over its env var. */
export type ConfigOverrides = {
  host?: string;
  port?: string;
  reconnectDelay?: string;
  maxReconnects?: string;
  debug?: boolean;
};

type Env = Record<string, string | undefined>;

function pick(flag: string | undefined, env: string | undefined): string | undefined {
  const v = (flag ?? env)?.trim();
  return v ? v : undefined;
}

function parseWhole(name: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER) {
  if (!/^\d+$/.test(raw)) throw new ConfigError(`${name} must be a whole number, got "${raw}"`);
  const n = parseInt(raw, 10);
  if (n < min || n > max)
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${n}`);
  return n;
}

/** Unset, blank, "0", "false", "no" and "off" are off; anything else is on. */
export function parseFlag(raw: string | undefined): boolean {
  const s = raw?.trim().toLowerCase();
  if (!s) return false;
  return s !== "0" && s !== "false" && s !== "no" && s !== "off";
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): BoardConfig {
  const host = pick(overrides.host, env.BOARD_HOST) ?? DEFAULT_HOST;
  if (/[\s/]/.test(host)) throw new ConfigError(`BOARD_HOST is not a host name: "${host}"`);

  const rawPort = pick(overrides.port, env.BOARD_PORT);
  const port = rawPort ? parseWhole("BOARD_PORT", rawPort, 1, 65535) : DEFAULT_PORT;

  const rawDelay = pick(overrides.reconnectDelay, env.BOARD_RECONNECT_DELAY_MS);
  const delayMs = rawDelay
    ? parseWhole("BOARD_RECONNECT_DELAY_MS", rawDelay, 0)
    : DEFAULT_RECONNECT_DELAY_MS;

  const rawMax = pick(overrides.maxReconnects, env.BOARD_MAX_RECONNECTS);
  const maxAttempts = rawMax ? parseWhole("BOARD_MAX_RECONNECTS", rawMax, 0) : null;

  return {
    host,
    port,
    reconnect: { delayMs, maxAttempts },
    debug: overrides.debug ?? parseFlag(env.BOARD_DEBUG),
  };
}

/** Fails startup early when the board host cannot be resolved. */
export async function resolveBoardHost(config: BoardConfig): Promise<string> {
  try {
    const { address } = await lookup(config.host);
    return address;
  } catch (err) {
    throw new ConfigError(`cannot resolve board host "${config.host}"`, { cause: err });
  }
}
