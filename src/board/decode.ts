// Decoder for the board's event envelope:
//   { type: "state", data: { connected, running, status, event, numThrows, throws? } }
// Frames of any other type are not ours and decode to null.

import { DecodeError } from "./errors";
import {
  EVENT_TYPE_BY_LABEL,
  SEGMENT_BED_BY_LABEL,
  STATUS_TYPE_BY_LABEL,
  type Message,
  type Segment,
  type Throw,
} from "./types";

export const STATE_FRAME_TYPE = "state";

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function field(obj: Json, key: string, path: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(obj, key) || obj[key] === undefined)
    throw new DecodeError({ kind: "MissingField", path });
  return obj[key];
}

function readObject(obj: Json, key: string, path: string): Json {
  const v = field(obj, key, path);
  if (!isRecord(v))
    throw new DecodeError({ kind: "InvalidField", path, expected: "an object" });
  return v;
}

function readBoolean(obj: Json, key: string, path: string): boolean {
  const v = field(obj, key, path);
  if (typeof v !== "boolean")
    throw new DecodeError({ kind: "InvalidField", path, expected: "a boolean" });
  return v;
}

function readInteger(obj: Json, key: string, path: string): number {
  const v = field(obj, key, path);
  if (typeof v !== "number" || !Number.isInteger(v))
    throw new DecodeError({ kind: "InvalidField", path, expected: "an integer" });
  return v;
}

function readString(obj: Json, key: string, path: string): string {
  const v = field(obj, key, path);
  if (typeof v !== "string")
    throw new DecodeError({ kind: "InvalidField", path, expected: "a string" });
  return v;
}

function decodeSegment(obj: Json, path: string): Segment {
  const bedLabel = readString(obj, "bed", `${path}.bed`);
  const bed = SEGMENT_BED_BY_LABEL.get(bedLabel);
  if (!bed)
    throw new DecodeError({ kind: "UnknownBed", path: `${path}.bed`, value: bedLabel });
  return {
    bed,
    multiplier: readInteger(obj, "multiplier", `${path}.multiplier`),
    number: readInteger(obj, "number", `${path}.number`),
    name: readString(obj, "name", `${path}.name`),
  };
}

function decodeThrows(data: Json): Throw[] {
  // Omitted when the controller holds no throws
  if (data.throws === undefined) return [];
  if (!Array.isArray(data.throws))
    throw new DecodeError({
      kind: "InvalidField",
      path: "data.throws",
      expected: "an array",
    });
  return data.throws.map((entry: unknown, i: number) => {
    const path = `data.throws[${i}]`;
    if (!isRecord(entry))
      throw new DecodeError({ kind: "InvalidField", path, expected: "an object" });
    const segPath = `${path}.segment`;
    return { segment: decodeSegment(readObject(entry, "segment", segPath), segPath) };
  });
}

/** Builds a Message from the envelope's `data` object. */
export function decodeStateData(data: Json): Message {
  const connected = readBoolean(data, "connected", "data.connected");
  const running = readBoolean(data, "running", "data.running");

  const statusLabel = readString(data, "status", "data.status");
  const status = STATUS_TYPE_BY_LABEL.get(statusLabel);
  if (!status) throw new DecodeError({ kind: "UnknownStatus", value: statusLabel });

  const eventLabel = readString(data, "event", "data.event");
  const event = EVENT_TYPE_BY_LABEL.get(eventLabel);
  if (!event) throw new DecodeError({ kind: "UnknownEvent", value: eventLabel });

  return {
    connected,
    running,
    status,
    event,
    numThrows: readInteger(data, "numThrows", "data.numThrows"),
    throws: decodeThrows(data),
  };
}

/**
 * Decodes one text frame from the event stream.
 * Returns null for envelopes whose `type` is not "state"; throws DecodeError
 * for anything malformed.
 */
export function decodeFrame(raw: string): Message | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError({
      kind: "MalformedFrame",
      detail: err instanceof Error ? err.message : String(err),
    });
  }
  if (!isRecord(parsed))
    throw new DecodeError({ kind: "MalformedFrame", detail: "envelope is not an object" });

  // any other discriminant, including non-strings, is another stream's frame
  if (field(parsed, "type", "type") !== STATE_FRAME_TYPE) return null;
  return decodeStateData(readObject(parsed, "data", "data"));
}
