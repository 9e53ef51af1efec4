import { z } from "zod";

import { DEFAULT_AGENT_NAME, formatIssues } from "./config";
import type { Deliberator } from "./deliberation";
import { ConfigurationError } from "./errors";
import { configure } from "./session";
import type { SessionOptions } from "./session";
import type { DecisionOutcome, DisclosureMode, EngineLogger, Message, Room } from "./types";

const ScenarioMessageSchema = z.object({
  member: z.string().trim().min(1),
  message: z.string(),
});

const ScenarioConversationSchema = z.object({
  conversation_id: z.union([z.number().int(), z.string().trim().min(1)]).optional(),
  participants: z.array(z.string().trim().min(1)).min(1),
  messages: z.array(ScenarioMessageSchema),
});

export const ScenarioSchema = z.object({
  agent_name: z.string().trim().min(1).default(DEFAULT_AGENT_NAME),
  all_persons: z.array(z.string().trim().min(1)).min(1),
  instructions: z.string().default(""),
  conversations: z.array(ScenarioConversationSchema),
});

export type Scenario = z.output<typeof ScenarioSchema>;

export const parseScenario = (raw: unknown): Scenario => {
  const parsed = ScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid scenario: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
};

export const parseScenarioText = (text: string): Scenario => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError("Scenario file is not valid JSON", { cause: error });
  }
  return parseScenario(raw);
};

export const roomIdFor = (conversation: Scenario["conversations"][number], position: number) =>
  String(conversation.conversation_id ?? position + 1);

export type ScenarioHooks = {
  onRoomOpen?: (payload: { room: Room; absent: string[] }) => void;
  onMessage?: (payload: { speaker: string; text: string }) => void;
  onOutcome?: (payload: {
    outcome: DecisionOutcome;
    agentName: string;
    messageNumber: number;
    elapsedMs: number;
    firstRequest: boolean;
  }) => void;
  onThoughts?: (payload: { rationale: string; agentName: string }) => void;
};

export const runScenario = async (
  scenario: Scenario,
  options: {
    deliberator: Deliberator;
    logger?: EngineLogger;
    deadlineMs?: number;
    disclosureMode?: DisclosureMode;
    hooks?: ScenarioHooks;
  }
): Promise<readonly Message[]> => {
  const hooks = options.hooks ?? {};
  const sessionOptions: SessionOptions = {
    agentName: scenario.agent_name,
    allPersons: scenario.all_persons,
    instructions: scenario.instructions,
    deliberator: options.deliberator,
    deadlineMs: options.deadlineMs,
    disclosureMode: options.disclosureMode,
    logger: options.logger,
    onThoughts: ({ rationale }) => hooks.onThoughts?.({ rationale, agentName: scenario.agent_name }),
  };
  const session = configure(sessionOptions);

  for (const [position, conversation] of scenario.conversations.entries()) {
    const room = session.openRoom(roomIdFor(conversation, position), conversation.participants);
    const present = new Set(room.participants);
    hooks.onRoomOpen?.({ room, absent: session.allPersons().filter((person) => !present.has(person)) });

    for (const [index, entry] of conversation.messages.entries()) {
      hooks.onMessage?.({ speaker: entry.member, text: entry.message });
      const startedAt = Date.now();
      const outcome = await session.observe(entry.member, entry.message);
      hooks.onOutcome?.({
        outcome,
        agentName: session.agentName,
        messageNumber: index + 1,
        elapsedMs: Date.now() - startedAt,
        firstRequest: position === 0 && index === 0,
      });
    }
    session.closeRoom();
  }

  return session.finish();
};
