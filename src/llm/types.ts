import type { EngineLogger, ReasoningEffortSetting } from "../types";

export type RoomTextMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

// The inbound message a generation is deciding about.
export type RoomTextOrigin = {
  roomId: string;
  sequenceIndex: number;
};

export type RoomTextRequest = {
  model: string;
  messages: RoomTextMessage[];
  temperature?: number;
  reasoningEffort?: ReasoningEffortSetting;
  abortSignal?: AbortSignal;
  traceName?: string;
  origin?: RoomTextOrigin;
};

export type RoomTextUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type RoomTextSpan = {
  end: (result: { text: string; usage: RoomTextUsage } | { error: string }) => void;
};

export type RoomTextGenerationTracer = (params: {
  name: string;
  model: string;
  messages: RoomTextMessage[];
  temperature: number;
  reasoningEffort: string | null;
  origin?: RoomTextOrigin;
}) => RoomTextSpan | null;

export type RoomTextGenerator = (request: RoomTextRequest) => Promise<string>;

export type RoomTextLogger = EngineLogger;
