import { ProtocolViolationError } from "../board/errors";
import { EVENT_TYPE_LABEL, STATUS_TYPE_LABEL, type Message } from "../board/types";
import { dwarn } from "../utils/logger";
import { dispatchMessage, type DispatchRecord } from "./dispatchMessage";

export function formatRecord(record: DispatchRecord): string {
  const head = `${EVENT_TYPE_LABEL[record.event]} | ${STATUS_TYPE_LABEL[record.status]}`;
  if (record.event !== "THROW_DETECTED") return head;
  return `${head} | ${record.numThrows} | ${record.segmentName} | ${record.score}`;
}

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Dispatches one decoded message and writes its summary line.
 * A protocol violation is logged and skipped so the stream keeps going.
 */
export function reportMessage(
  message: Message,
  write: LineWriter = stdoutWriter,
): DispatchRecord | null {
  let record: DispatchRecord;
  try {
    record = dispatchMessage(message);
  } catch (err) {
    if (!(err instanceof ProtocolViolationError)) throw err;
    dwarn("[Board]", err.message);
    return null;
  }
  write(formatRecord(record));
  return record;
}
