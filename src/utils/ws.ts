import type { BoardConfig } from "./config";

export const EVENTS_PATH = "/api/events";
// The stream carries several envelope types; only state frames are wanted.
export const EVENTS_TYPE_FILTER = "state";

export function boardEventsUrl(
  config: Pick<BoardConfig, "host" | "port">,
  type: string = EVENTS_TYPE_FILTER,
): string {
  const url = new URL(`ws://${config.host}:${config.port}${EVENTS_PATH}`);
  url.searchParams.set("type", type);
  return url.toString();
}
