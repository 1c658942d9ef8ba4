import type { BoardConfig } from "./config";

export type ApiPath = string;

function normalizePath(path: ApiPath): string {
  return path.startsWith("/") ? path : `/${path}`;
}

export function apiBaseUrl(config: Pick<BoardConfig, "host" | "port">): string {
  return `http://${config.host}:${config.port}`;
}

export function resolveApiUrl(path: ApiPath, config: Pick<BoardConfig, "host" | "port">): string {
  if (/^https?:\/\//i.test(path)) return path;
  return `${apiBaseUrl(config)}${normalizePath(path)}`;
}

export function apiFetch(
  path: ApiPath,
  config: Pick<BoardConfig, "host" | "port">,
  init?: RequestInit,
) {
  return fetch(resolveApiUrl(path, config), init);
}
