import { ControlRequestError } from "../board/errors";
import { apiFetch } from "./api";
import type { BoardConfig } from "./config";
import { dlog } from "./logger";

type Target = Pick<BoardConfig, "host" | "port">;

// Fire-and-forget: the response body is never read.
async function sendCommand(method: "PUT" | "POST", path: string, target: Target): Promise<void> {
  let res: Response;
  try {
    res = await apiFetch(path, target, { method });
  } catch (err) {
    throw new ControlRequestError(method, path, null, { cause: err });
  }
  // discarded unread
  await res.body?.cancel();
  if (!res.ok) throw new ControlRequestError(method, path, res.status);
  dlog("[BoardControl]", method, path, res.status);
}

/** Resumes detection. PUT /api/start */
export function startBoard(target: Target): Promise<void> {
  return sendCommand("PUT", "/api/start", target);
}

/** Pauses detection. PUT /api/stop */
export function stopBoard(target: Target): Promise<void> {
  return sendCommand("PUT", "/api/stop", target);
}

/** Forces the board out of a stuck state. POST /api/reset */
export function resetBoard(target: Target): Promise<void> {
  return sendCommand("POST", "/api/reset", target);
}
