import { generateText } from "ai";

import { describeError } from "../errors";
import { createOpenAIClient } from "./openai-client";
import { buildReasoningProviderOptions, resolveReasoningEffort } from "./reasoning";
import type { RoomTextGenerationTracer, RoomTextGenerator, RoomTextLogger, RoomTextMessage } from "./types";

type OpenAIGeneratorOptions = {
  apiKey?: string;
  baseURL?: string;
  supportsReasoningEffort?: (modelId: string) => boolean;
  logger?: RoomTextLogger;
  startGeneration?: RoomTextGenerationTracer;
};

export const DEFAULT_TEMPERATURE = 0.7;

export const getMessageStats = (messages: RoomTextMessage[]) => {
  const messageChars = messages.reduce((total, message) => total + message.content.length, 0);
  return {
    messageCount: messages.length,
    messageChars,
    estimatedTokens: Math.ceil(messageChars / 4),
  };
};

export const createOpenAIGenerator = (options: OpenAIGeneratorOptions = {}): RoomTextGenerator => {
  const client = createOpenAIClient({ apiKey: options.apiKey, baseURL: options.baseURL });
  const logger = options.logger;

  return async (request) => {
    const temperature = request.temperature ?? DEFAULT_TEMPERATURE;
    const reasoningEffort = resolveReasoningEffort(request.reasoningEffort);
    const roomId = request.origin?.roomId ?? "n/a";
    const sequence = request.origin?.sequenceIndex ?? "n/a";
    const stats = getMessageStats(request.messages);

    logger?.info(
      "[room-engine] model=%s room=%s sequence=%s messages=%d messageChars=%d estPromptTokens=%d temperature=%s reasoningEffort=%s",
      request.model,
      roomId,
      sequence,
      stats.messageCount,
      stats.messageChars,
      stats.estimatedTokens,
      temperature,
      reasoningEffort ?? "none"
    );

    const span =
      options.startGeneration?.({
        name: request.traceName ?? "room-engine.generation",
        model: request.model,
        messages: request.messages,
        temperature,
        reasoningEffort,
        origin: request.origin,
      }) ?? null;

    try {
      const result = await generateText({
        model: client.chat(request.model),
        messages: request.messages,
        temperature,
        providerOptions: buildReasoningProviderOptions({
          modelId: request.model,
          effort: request.reasoningEffort,
          supportsReasoningEffort: options.supportsReasoningEffort,
        }),
        abortSignal: request.abortSignal,
      });
      span?.end({
        text: result.text,
        usage: {
          promptTokens: result.usage?.inputTokens,
          completionTokens: result.usage?.outputTokens,
          totalTokens: result.usage?.totalTokens,
        },
      });
      return result.text;
    } catch (error) {
      const reason = describeError(error);
      logger?.error?.("[room-engine] generation failed model=%s room=%s sequence=%s: %s", request.model, roomId, sequence, reason);
      span?.end({ error: reason });
      throw error;
    }
  };
};
