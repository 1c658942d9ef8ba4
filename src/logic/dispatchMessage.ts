import { ProtocolViolationError } from "../board/errors";
import type { EventType, Message, StatusType } from "../board/types";

export type ThrowRecord = {
  event: "THROW_DETECTED";
  status: StatusType;
  numThrows: number;
  segmentName: string;
  score: number;
};

export type EventRecord = {
  event: Exclude<EventType, "THROW_DETECTED">;
  status: StatusType;
};

export type DispatchRecord = ThrowRecord | EventRecord;

/**
 * Turns a decoded state message into the record shown to the user.
 * Only "Throw detected" reads the throws; the latest (last) one is scored.
 */
export function dispatchMessage(msg: Message): DispatchRecord {
  const { event, status } = msg;
  if (event !== "THROW_DETECTED") return { event, status };

  const latest = msg.throws.at(-1);
  if (!latest)
    throw new ProtocolViolationError(
      `"Throw detected" arrived with no throws (numThrows=${msg.numThrows})`,
    );
  const { segment } = latest;
  return {
    event,
    status,
    numThrows: msg.numThrows,
    segmentName: segment.name,
    score: segment.multiplier * segment.number,
  };
}
