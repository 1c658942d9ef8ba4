import { describe, it, expect } from "vitest";
import { decodeFrame } from "../decode";
import { DecodeError, type DecodeReason } from "../errors";
import {
  EVENT_TYPES,
  EVENT_TYPE_LABEL,
  SEGMENT_BEDS,
  SEGMENT_BED_LABEL,
  STATUS_TYPES,
  STATUS_TYPE_LABEL,
} from "../types";

function stateFrame(data: Record<string, unknown>, type = "state") {
  return JSON.stringify({ type, data });
}

const baseData = {
  connected: true,
  running: true,
  status: "Throw",
  event: "Throw detected",
  numThrows: 1,
  throws: [{ segment: { bed: "Triple", multiplier: 3, number: 20, name: "T20" } }],
};

function reasonOf(fn: () => unknown): DecodeReason {
  try {
    fn();
  } catch (err) {
    if (err instanceof DecodeError) return err.reason;
    throw err;
  }
  throw new Error("expected a DecodeError");
}

describe("decodeFrame", () => {
  it("decodes a throw-detected state frame", () => {
    const msg = decodeFrame(stateFrame(baseData));
    expect(msg).toEqual({
      connected: true,
      running: true,
      status: "THROW",
      event: "THROW_DETECTED",
      numThrows: 1,
      throws: [{ segment: { bed: "TRIPLE", multiplier: 3, number: 20, name: "T20" } }],
    });
  });

  it("ignores frames whose type is not state", () => {
    expect(decodeFrame(JSON.stringify({ type: "ping" }))).toBeNull();
    // data is not even looked at for foreign types
    expect(decodeFrame(stateFrame({ bogus: true }, "motion"))).toBeNull();
    expect(decodeFrame('{"type":1}')).toBeNull();
    expect(decodeFrame('{"type":null,"data":{}}')).toBeNull();
    expect(decodeFrame('{"type":{"kind":"state"}}')).toBeNull();
  });

  it("treats a missing throws field as no throws", () => {
    const { throws: _omit, ...rest } = baseData;
    const msg = decodeFrame(
      stateFrame({ ...rest, status: "Stopped", event: "Stopped", numThrows: 0 }),
    );
    expect(msg?.throws).toEqual([]);
    expect(msg?.numThrows).toBe(0);
  });

  it("keeps throws in the order received", () => {
    const msg = decodeFrame(
      stateFrame({
        ...baseData,
        numThrows: 3,
        throws: [
          { segment: { bed: "SingleOuter", multiplier: 1, number: 5, name: "S5" } },
          { segment: { bed: "Double", multiplier: 2, number: 16, name: "D16" } },
          { segment: { bed: "Outside", multiplier: 0, number: 0, name: "MISS" } },
        ],
      }),
    );
    expect(msg?.throws.map((t) => t.segment.name)).toEqual(["S5", "D16", "MISS"]);
    expect(msg?.throws.map((t) => t.segment.bed)).toEqual(["SINGLE_OUTER", "DOUBLE", "OUTSIDE"]);
  });

  it("maps every known status label", () => {
    for (const status of STATUS_TYPES) {
      const msg = decodeFrame(stateFrame({ ...baseData, status: STATUS_TYPE_LABEL[status] }));
      expect(msg?.status).toBe(status);
    }
  });

  it("maps every known event label", () => {
    for (const event of EVENT_TYPES) {
      const msg = decodeFrame(stateFrame({ ...baseData, event: EVENT_TYPE_LABEL[event] }));
      expect(msg?.event).toBe(event);
    }
  });

  it("maps every known bed label", () => {
    for (const bed of SEGMENT_BEDS) {
      const msg = decodeFrame(
        stateFrame({
          ...baseData,
          throws: [{ segment: { bed: SEGMENT_BED_LABEL[bed], multiplier: 1, number: 1, name: "S1" } }],
        }),
      );
      expect(msg?.throws[0]?.segment.bed).toBe(bed);
    }
  });

  it("rejects an unknown status", () => {
    expect(reasonOf(() => decodeFrame(stateFrame({ ...baseData, status: "Sleeping" })))).toEqual({
      kind: "UnknownStatus",
      value: "Sleeping",
    });
  });

  it("rejects an unknown event", () => {
    expect(reasonOf(() => decodeFrame(stateFrame({ ...baseData, event: "throw detected" })))).toEqual({
      kind: "UnknownEvent",
      value: "throw detected",
    });
  });

  it("rejects an unknown bed with its path", () => {
    const frame = stateFrame({
      ...baseData,
      numThrows: 2,
      throws: [
        baseData.throws[0],
        { segment: { bed: "Bullseye", multiplier: 2, number: 25, name: "DB" } },
      ],
    });
    expect(reasonOf(() => decodeFrame(frame))).toEqual({
      kind: "UnknownBed",
      path: "data.throws[1].segment.bed",
      value: "Bullseye",
    });
  });

  it("reports missing required fields by path", () => {
    const { numThrows: _omit, ...noCount } = baseData;
    expect(reasonOf(() => decodeFrame(stateFrame(noCount)))).toEqual({
      kind: "MissingField",
      path: "data.numThrows",
    });
    expect(reasonOf(() => decodeFrame(JSON.stringify({ type: "state" })))).toEqual({
      kind: "MissingField",
      path: "data",
    });
    expect(reasonOf(() => decodeFrame(JSON.stringify({ data: baseData })))).toEqual({
      kind: "MissingField",
      path: "type",
    });
    expect(
      reasonOf(() =>
        decodeFrame(
          stateFrame({ ...baseData, throws: [{ segment: { bed: "Triple", multiplier: 3, number: 20 } }] }),
        ),
      ),
    ).toEqual({ kind: "MissingField", path: "data.throws[0].segment.name" });
  });

  it("rejects fields of the wrong type", () => {
    expect(reasonOf(() => decodeFrame(stateFrame({ ...baseData, running: "yes" })))).toEqual({
      kind: "InvalidField",
      path: "data.running",
      expected: "a boolean",
    });
    expect(reasonOf(() => decodeFrame(stateFrame({ ...baseData, numThrows: 1.5 })))).toEqual({
      kind: "InvalidField",
      path: "data.numThrows",
      expected: "an integer",
    });
    expect(reasonOf(() => decodeFrame(stateFrame({ ...baseData, throws: {} })))).toEqual({
      kind: "InvalidField",
      path: "data.throws",
      expected: "an array",
    });
  });

  it("rejects text that is not a JSON object", () => {
    expect(reasonOf(() => decodeFrame("not json")).kind).toBe("MalformedFrame");
    expect(reasonOf(() => decodeFrame("[1,2]"))).toEqual({
      kind: "MalformedFrame",
      detail: "envelope is not an object",
    });
  });

  it("gives decode errors a readable message", () => {
    const err = new DecodeError({ kind: "UnknownBed", path: "data.throws[0].segment.bed", value: "X" });
    expect(err.message).toBe('unknown bed "X" at data.throws[0].segment.bed');
    expect(err.name).toBe("DecodeError");
  });
});
