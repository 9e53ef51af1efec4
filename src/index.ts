export type {
  ContextEntry,
  ContextView,
  DecisionOutcome,
  DecisionResult,
  DecisionState,
  DisclosureMode,
  EngineLogger,
  Message,
  MessageDraft,
  MessageKind,
  ParticipantRelation,
  Person,
  ReasoningEffort,
  ReasoningEffortSetting,
  Room,
  RoomStatus,
} from "./types";
export { REASONING_EFFORT_SETTINGS, silent, spoken } from "./types";
export {
  ConfigurationError,
  DecisionInProgressError,
  EngineError,
  InvalidProvenanceError,
  NoOpenRoomError,
  ReasoningUnavailableError,
  RoomAlreadyOpenError,
  UnknownPersonError,
} from "./errors";
export type { EngineErrorCode } from "./errors";
export { createMessageStore } from "./message-store";
export type { MessageStore, ProvenanceAuthority } from "./message-store";
export { createRoomTracker } from "./room-tracker";
export type { RoomTracker } from "./room-tracker";
export { buildContextView, classifyRelation, renderHistoryLines } from "./context";
export { createDecisionEngine } from "./decision";
export type { DecisionEngine, DecisionEngineOptions } from "./decision";
export { createModelDeliberator, parseDeliberationReply } from "./deliberation";
export type { Deliberation, DeliberationRequest, Deliberator } from "./deliberation";
export { buildDeliberationMessages, buildDeliberationSystemPrompt } from "./prompts";
export { configure } from "./session";
export type { AgentSession, SessionOptions } from "./session";
export { parseEnvConfig, parseSessionSettings } from "./config";
export type { EnvConfig, SessionSettings, SessionSettingsInput } from "./config";
export { parseScenario, parseScenarioText, runScenario } from "./scenario";
export type { Scenario, ScenarioHooks } from "./scenario";
export { createMarkdownTranscript } from "./transcript";
export { serializeMessage, silencesIn, toNdjson } from "./audit";
export * from "./llm";
