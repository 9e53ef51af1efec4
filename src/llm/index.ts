export type {
  RoomTextGenerationTracer,
  RoomTextGenerator,
  RoomTextLogger,
  RoomTextMessage,
  RoomTextOrigin,
  RoomTextRequest,
  RoomTextSpan,
  RoomTextUsage,
} from "./types";
export { DEFAULT_TEMPERATURE, createOpenAIGenerator, getMessageStats } from "./generator";
export { createOpenAIClient } from "./openai-client";
export { buildReasoningProviderOptions, resolveReasoningEffort, supportsReasoningEffortDefault } from "./reasoning";
