// Domain model for the board's state stream.
// Every variant has exactly one wire label; unknown labels fail decoding.

export const SEGMENT_BEDS = [
  "SINGLE_INNER",
  "SINGLE_OUTER",
  "DOUBLE",
  "TRIPLE",
  "OUTSIDE",
] as const;
export type SegmentBed = (typeof SEGMENT_BEDS)[number];

export const SEGMENT_BED_LABEL: Record<SegmentBed, string> = {
  SINGLE_INNER: "SingleInner",
  SINGLE_OUTER: "SingleOuter",
  DOUBLE: "Double",
  TRIPLE: "Triple",
  OUTSIDE: "Outside",
};

export const STATUS_TYPES = [
  "STARTING",
  "STOPPING",
  "STOPPED",
  "THROW",
  "TAKEOUT",
  "TAKEOUT_IN_PROGRESS",
  "CALIBRATING",
] as const;
export type StatusType = (typeof STATUS_TYPES)[number];

export const STATUS_TYPE_LABEL: Record<StatusType, string> = {
  STARTING: "Starting",
  STOPPING: "Stopping",
  STOPPED: "Stopped",
  THROW: "Throw",
  TAKEOUT: "Takeout",
  TAKEOUT_IN_PROGRESS: "Takeout in progress",
  CALIBRATING: "Calibrating",
};

export const EVENT_TYPES = [
  "STARTING",
  "STARTED",
  "STOPPING",
  "STOPPED",
  "THROW_DETECTED",
  "TAKEOUT_STARTED",
  "TAKEOUT_FINISHED",
  "MANUAL_RESET",
  "CALIBRATION_STARTED",
  "CALIBRATION_FINISHED",
  "CALIBRATION_FAILED",
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export const EVENT_TYPE_LABEL: Record<EventType, string> = {
  STARTING: "Starting",
  STARTED: "Started",
  STOPPING: "Stopping",
  STOPPED: "Stopped",
  THROW_DETECTED: "Throw detected",
  TAKEOUT_STARTED: "Takeout started",
  TAKEOUT_FINISHED: "Takeout finished",
  MANUAL_RESET: "Manual reset",
  CALIBRATION_STARTED: "Calibration started",
  CALIBRATION_FINISHED: "Calibration finished",
  CALIBRATION_FAILED: "Calibration failed",
};

/** Smallest scoreable unit of the board, as reported by the controller. */
export type Segment = {
  readonly bed: SegmentBed;
  // 0 miss, 1 single, 2 double, 3 triple
  readonly multiplier: number;
  // 1-20 wedges, 25 bull, 0 miss
  readonly number: number;
  // e.g. "T20", "S1", "MISS"
  readonly name: string;
};

export type Throw = {
  readonly segment: Segment;
};

export type Message = {
  readonly connected: boolean;
  readonly running: boolean;
  readonly status: StatusType;
  readonly event: EventType;
  /** Throws the controller currently holds in memory. */
  readonly numThrows: number;
  /** Oldest first; the last entry is the latest throw. Empty when the frame omits it. */
  readonly throws: readonly Throw[];
};

// label -> variant, built from the tables above
function byLabel<T extends string>(
  variants: readonly T[],
  labels: Record<T, string>,
): ReadonlyMap<string, T> {
  return new Map(variants.map((v) => [labels[v], v] as const));
}

export const SEGMENT_BED_BY_LABEL = byLabel(SEGMENT_BEDS, SEGMENT_BED_LABEL);
export const STATUS_TYPE_BY_LABEL = byLabel(STATUS_TYPES, STATUS_TYPE_LABEL);
export const EVENT_TYPE_BY_LABEL = byLabel(EVENT_TYPES, EVENT_TYPE_LABEL);
