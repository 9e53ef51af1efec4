#!/usr/bin/env node
import { config as dotenvConfig } from "dotenv";
import { readFileSync, writeFileSync } from "fs";

import { USAGE, parseCliArgs } from "./cli-args";
import { toNdjson } from "./audit";
import { parseEnvConfig } from "./config";
import { createModelDeliberator } from "./deliberation";
import { EngineError, describeError } from "./errors";
import { createOpenAIGenerator } from "./llm";
import { parseScenarioText, runScenario } from "./scenario";
import { createMarkdownTranscript, ANALYSIS_QUESTIONS } from "./transcript";
import type { EngineLogger } from "./types";

const createConsoleLogger = (debug: boolean): EngineLogger => ({
  info: (message, ...meta) => {
    if (debug) console.info(message, ...meta);
  },
  warn: (message, ...meta) => console.warn(message, ...meta),
  error: (message, ...meta) => console.error(message, ...meta),
});

const RULE = "=".repeat(60);

export const main = async (argv: string[]) => {
  dotenvConfig();
  const args = parseCliArgs(argv);
  const env = parseEnvConfig(process.env);
  const apiKey = args.apiKey ?? env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OpenAI API key not provided. Set OPENAI_API_KEY or use --api-key.");
  }

  const logger = createConsoleLogger(args.debug);
  const scenario = parseScenarioText(readFileSync(args.scenarioPath, "utf-8"));
  const transcript = createMarkdownTranscript();
  const agentName = scenario.agent_name;

  console.log(`\nMulti-Room Conversation Experiment: Testing Privacy & Context Management`);
  console.log(`AI Agent: ${agentName}`);
  console.log(`All persons: ${scenario.all_persons.join(", ")}`);
  console.log(`Number of conversations: ${scenario.conversations.length}`);
  console.log(RULE);
  transcript.experiment({
    agentName,
    allPersons: scenario.all_persons,
    conversationCount: scenario.conversations.length,
  });

  const deliberator = createModelDeliberator({
    generateText: createOpenAIGenerator({ apiKey, baseURL: env.OPENAI_BASE_URL, logger }),
    model: args.model ?? env.OPENAI_MODEL,
    reasoningEffort: env.OPENAI_REASONING_EFFORT,
  });

  const history = await runScenario(scenario, {
    deliberator,
    logger,
    deadlineMs: args.timeoutMs ?? env.DELIBERATION_TIMEOUT_MS,
    disclosureMode: args.strict ? "strict" : "advisory",
    hooks: {
      onRoomOpen: ({ room, absent }) => {
        console.log(`\n${RULE}\nConversation #${room.roomId}\nParticipants: ${room.participants.join(", ")} + ${agentName}`);
        if (absent.length) console.log(`Not present: ${absent.join(", ")}`);
        console.log(`${RULE}\n`);
        transcript.room({ roomId: room.roomId, participants: [...room.participants], agentName, absent });
      },
      onMessage: ({ speaker, text }) => {
        console.log(`${speaker}: ${text}\n`);
        transcript.message(speaker, text);
      },
      onThoughts: ({ rationale }) => {
        if (!args.showThoughts) return;
        console.log(`(${agentName}'s thoughts: ${rationale})`);
        transcript.thoughts(agentName, rationale);
      },
      onOutcome: ({ outcome, messageNumber, elapsedMs, firstRequest }) => {
        if (args.debug) {
          const marker = firstRequest ? " (FIRST REQUEST)" : "";
          console.log(`Message #${messageNumber} processed in ${(elapsedMs / 1000).toFixed(2)}s${marker}`);
        }
        if (outcome.type === "spoken") {
          console.log(`${agentName}: ${outcome.text}\n`);
          transcript.reply(agentName, outcome.text);
        } else {
          console.log(`${agentName}: silent\n`);
          transcript.silence(agentName);
        }
      },
    },
  });

  console.log(RULE);
  console.log("All conversations completed.\n\nAnalysis Questions:");
  ANALYSIS_QUESTIONS.forEach((question, index) => console.log(`${index + 1}. ${question}`));
  transcript.analysis();

  if (args.logFile) {
    writeFileSync(args.logFile, transcript.toString(), "utf-8");
    console.log(`\nConversation log saved to: ${args.logFile}`);
  }
  if (args.auditFile) {
    writeFileSync(args.auditFile, `${toNdjson(history)}\n`, "utf-8");
    console.log(`Message history saved to: ${args.auditFile}`);
  }
};

if (require.main === module) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    const prefix = error instanceof EngineError ? `${error.name}: ` : "Error: ";
    console.error(`${prefix}${describeError(error)}`);
    console.error(USAGE);
    process.exitCode = 1;
  });
}
