import { z } from "zod";

import { ReasoningUnavailableError } from "./errors";
import type { RoomTextGenerator, RoomTextMessage } from "./llm/types";
import { buildDeliberationMessages } from "./prompts";
import { silent, spoken } from "./types";
import type { ContextView, DecisionOutcome, Message, ReasoningEffortSetting } from "./types";

export type DeliberationRequest = {
  agentName: string;
  context: ContextView;
  instructions: string;
  inbound: Message;
};

export type Deliberation = {
  rationale: string;
  outcome: DecisionOutcome;
};

/**
 * The replaceable reasoning capability. Implementations must stop work when
 * `signal` aborts; the engine treats any rejection as unavailable reasoning.
 */
export type Deliberator = (request: DeliberationRequest, options: { signal: AbortSignal }) => Promise<Deliberation>;

const DeliberationReplySchema = z.object({
  thoughts: z.string().default(""),
  action: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["say", "silent"])
  ),
  message: z.string().optional(),
});

export type DeliberationReply = z.infer<typeof DeliberationReplySchema>;

const parseMaybeJsonObject = (raw: string): unknown => {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  try {
    return JSON.parse(trimmed);
  } catch {
    // Models sometimes wrap the object in prose or code fences.
  }
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  try {
    return JSON.parse(trimmed.slice(start, end + 1));
  } catch {
    return null;
  }
};

const PHASE_TWO_MARKER = /phase\s*2[:\s-]*/i;

// Keeps only the private reasoning: drops anything from a "Phase 2" marker on and the reply itself.
export const cleanThoughts = (thoughts: string, reply?: string) => {
  let cleaned = thoughts;
  const marker = PHASE_TWO_MARKER.exec(cleaned);
  if (marker) {
    cleaned = cleaned.slice(0, marker.index);
  }
  if (reply?.trim()) {
    const replyStart = cleaned.indexOf(reply.trim());
    if (replyStart > 0) cleaned = cleaned.slice(0, replyStart);
  }
  return cleaned.trim();
};

export const parseDeliberationReply = (raw: string): Deliberation => {
  const parsed = DeliberationReplySchema.safeParse(parseMaybeJsonObject(raw));
  if (!parsed.success) {
    throw new ReasoningUnavailableError(`Unreadable deliberation reply: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const reply = parsed.data;
  const message = reply.message?.trim() ?? "";
  const outcome = reply.action === "say" && message ? spoken(message) : silent();
  return {
    rationale: cleanThoughts(reply.thoughts, outcome.type === "spoken" ? outcome.text : undefined),
    outcome,
  };
};

export const createModelDeliberator = (params: {
  generateText: RoomTextGenerator;
  model: string;
  temperature?: number;
  reasoningEffort?: ReasoningEffortSetting;
}): Deliberator => {
  return async (request, options) => {
    const messages: RoomTextMessage[] = buildDeliberationMessages(request);
    const raw = await params.generateText({
      model: params.model,
      messages,
      temperature: params.temperature,
      reasoningEffort: params.reasoningEffort,
      abortSignal: options.signal,
      traceName: "room-engine.deliberation",
      origin: {
        roomId: request.context.roomId,
        sequenceIndex: request.inbound.sequenceIndex,
      },
    });
    return parseDeliberationReply(raw);
  };
};
