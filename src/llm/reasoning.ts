import type { ReasoningEffort, ReasoningEffortSetting } from "../types";

export const resolveReasoningEffort = (value: ReasoningEffortSetting | null | undefined): ReasoningEffort | null => {
  if (!value || value === "auto") return null;
  return value;
};

const matchesReasoningPrefix = (modelId: string) => {
  const bare = modelId.startsWith("openai/") ? modelId.slice("openai/".length) : modelId;
  if (bare.startsWith("gpt-5")) return true;
  if (/^o\d/.test(bare)) return true;
  return false;
};

export const supportsReasoningEffortDefault = (modelId: string) => {
  if (!modelId) return false;
  return matchesReasoningPrefix(modelId);
};

export const buildReasoningProviderOptions = (params: {
  modelId: string;
  effort?: ReasoningEffortSetting | null;
  supportsReasoningEffort?: (modelId: string) => boolean;
}) => {
  const resolved = resolveReasoningEffort(params.effort);
  if (!resolved || resolved === "none") return undefined;
  const supports = params.supportsReasoningEffort ?? supportsReasoningEffortDefault;
  if (!supports(params.modelId)) return undefined;
  return {
    openai: {
      reasoningEffort: resolved,
    },
  };
};
