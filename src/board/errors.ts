export type DecodeReason =
  | { kind: "MalformedFrame"; detail: string }
  | { kind: "MissingField"; path: string }
  | { kind: "InvalidField"; path: string; expected: string }
  | { kind: "UnknownStatus"; value: string }
  | { kind: "UnknownEvent"; value: string }
  | { kind: "UnknownBed"; path: string; value: string };

function describeReason(reason: DecodeReason): string {
  switch (reason.kind) {
    case "MalformedFrame":
      return `malformed frame: ${reason.detail}`;
    case "MissingField":
      return `missing field ${reason.path}`;
    case "InvalidField":
      return `field ${reason.path} is not ${reason.expected}`;
    case "UnknownStatus":
      return `unknown status "${reason.value}"`;
    case "UnknownEvent":
      return `unknown event "${reason.value}"`;
    case "UnknownBed":
      return `unknown bed "${reason.value}" at ${reason.path}`;
  }
}

/** A single inbound frame could not be decoded. The stream carries on. */
export class DecodeError extends Error {
  readonly reason: DecodeReason;

  constructor(reason: DecodeReason) {
    super(describeReason(reason));
    this.name = "DecodeError";
    this.reason = reason;
  }
}

/** The controller sent something that breaks its own protocol contract. */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ControlRequestError extends Error {
  readonly method: string;
  readonly path: string;
  // absent when no response came back at all
  readonly status: number | null;

  constructor(
    method: string,
    path: string,
    status: number | null,
    options?: { cause?: unknown },
  ) {
    super(
      status === null
        ? `${method} ${path} failed`
        : `${method} ${path} failed with HTTP ${status}`,
      options,
    );
    this.name = "ControlRequestError";
    this.method = method;
    this.path = path;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
