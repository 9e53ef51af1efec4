import { z } from "zod";

import { ConfigurationError } from "./errors";
import { REASONING_EFFORT_SETTINGS } from "./types";

export const MAX_INSTRUCTIONS_CHARS = 20000;
export const DEFAULT_AGENT_NAME = "AI Assistant";
export const DEFAULT_MODEL = "gpt-4o-mini";
// Largest delay a Node timer holds; longer ones fire at once.
export const MAX_DEADLINE_MS = 2_147_483_647;

const personName = z
  .string({ invalid_type_error: "person names must be strings" })
  .trim()
  .min(1, "person names must not be blank");

export const SessionSettingsSchema = z
  .object({
    agentName: z.string().trim().min(1, "agent name must not be blank").default(DEFAULT_AGENT_NAME),
    allPersons: z.array(personName).min(1, "at least one person is required"),
    instructions: z
      .string({ invalid_type_error: "instructions must be text" })
      .max(MAX_INSTRUCTIONS_CHARS, `instructions must be at most ${MAX_INSTRUCTIONS_CHARS} characters`)
      .default(""),
    disclosureMode: z.enum(["advisory", "strict"]).default("advisory"),
    deadlineMs: z.number().int().positive().max(MAX_DEADLINE_MS, `deadline must be at most ${MAX_DEADLINE_MS}ms`).optional(),
  })
  .superRefine((settings, ctx) => {
    const seen = new Set<string>();
    for (const person of settings.allPersons) {
      if (seen.has(person)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["allPersons"], message: `"${person}" is listed twice` });
      }
      seen.add(person);
    }
    if (seen.has(settings.agentName)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["agentName"],
        message: `agent name "${settings.agentName}" collides with a person`,
      });
    }
  });

export type SessionSettingsInput = z.input<typeof SessionSettingsSchema>;
export type SessionSettings = z.output<typeof SessionSettingsSchema>;

export const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");

export const parseSessionSettings = (input: unknown): SessionSettings => {
  const parsed = SessionSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid session configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};

export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_REASONING_EFFORT: z.enum(REASONING_EFFORT_SETTINGS).default("auto"),
  DELIBERATION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_DEADLINE_MS, `deadline must be at most ${MAX_DEADLINE_MS}ms`)
    .optional(),
});

export type EnvConfig = z.output<typeof EnvSchema>;

export const parseEnvConfig = (env: Record<string, string | undefined>): EnvConfig => {
  // Empty values in .env files mean "not set".
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
};
