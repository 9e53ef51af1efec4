export const REASONING_EFFORT_SETTINGS = ["auto", "none", "minimal", "low", "medium", "high"] as const;
export type ReasoningEffortSetting = (typeof REASONING_EFFORT_SETTINGS)[number];
export type ReasoningEffort = Exclude<ReasoningEffortSetting, "auto">;

export type Person = string;

export type EngineLogger = {
  info: (message: string, ...meta: unknown[]) => void;
  warn?: (message: string, ...meta: unknown[]) => void;
  error?: (message: string, ...meta: unknown[]) => void;
};

export type MessageKind = "utterance" | "silence";

export type Message = {
  readonly speaker: Person;
  readonly kind: MessageKind;
  readonly text: string;
  readonly roomId: string;
  readonly participantsAtTime: readonly Person[];
  readonly sequenceIndex: number;
};

export type MessageDraft = Omit<Message, "sequenceIndex">;

export type RoomStatus = "open" | "closed";

export type Room = {
  readonly roomId: string;
  readonly participants: readonly Person[];
  readonly status: RoomStatus;
};

// How the participants of a past message compare to the room the agent is in now.
export type ParticipantRelation = "same" | "subset" | "superset" | "disjoint";

export type DisclosureMode = "advisory" | "strict";

export type ContextEntry = {
  message: Message;
  relation: ParticipantRelation;
  sharedWith: Person[];
  absentAtOrigin: Person[];
  entitled: boolean;
};

export type ContextView = {
  roomId: string;
  agentName: string;
  currentParticipants: Person[];
  absentPersons: Person[];
  visibleHistory: ContextEntry[];
  disclosureMode: DisclosureMode;
};

export type DecisionOutcome = { type: "spoken"; text: string } | { type: "silent" };

export type DecisionState = "idle" | "deliberating" | "emitting" | "silent";

export type DecisionResult = {
  outcome: DecisionOutcome;
  rationale: string;
  trace: string[];
  failure?: string;
};

export const spoken = (text: string): DecisionOutcome => ({ type: "spoken", text });

export const silent = (): DecisionOutcome => ({ type: "silent" });
