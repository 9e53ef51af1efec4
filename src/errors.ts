export type EngineErrorCode =
  | "CONFIGURATION_ERROR"
  | "ROOM_ALREADY_OPEN"
  | "NO_OPEN_ROOM"
  | "UNKNOWN_PERSON"
  | "INVALID_PROVENANCE"
  | "REASONING_UNAVAILABLE"
  | "DECISION_IN_PROGRESS";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Setup-time failure; the session never starts.
export class ConfigurationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION_ERROR", message, options);
  }
}

export class RoomAlreadyOpenError extends EngineError {
  readonly openRoomId: string;

  constructor(openRoomId: string, requestedRoomId: string) {
    super("ROOM_ALREADY_OPEN", `Cannot open room "${requestedRoomId}": room "${openRoomId}" is still open`);
    this.openRoomId = openRoomId;
  }
}

export class NoOpenRoomError extends EngineError {
  constructor(operation: string) {
    super("NO_OPEN_ROOM", `${operation} requires an open room`);
  }
}

export class UnknownPersonError extends EngineError {
  readonly person: string;

  constructor(person: string) {
    super("UNKNOWN_PERSON", `"${person}" is not part of the configured persons`);
    this.person = person;
  }
}

export class InvalidProvenanceError extends EngineError {
  constructor(message: string) {
    super("INVALID_PROVENANCE", message);
  }
}

// Absorbed by the decision engine and turned into silence.
export class ReasoningUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REASONING_UNAVAILABLE", message, options);
  }
}

export class DecisionInProgressError extends EngineError {
  constructor(operation: string) {
    super("DECISION_IN_PROGRESS", `${operation} is not allowed while a decision is being made`);
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
