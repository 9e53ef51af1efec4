import { describe, expect, it } from "vitest";

import { buildReasoningProviderOptions, resolveReasoningEffort, supportsReasoningEffortDefault } from "./reasoning";

describe("resolveReasoningEffort", () => {
  it("maps auto and missing values to no setting", () => {
    expect(resolveReasoningEffort("auto")).toBeNull();
    expect(resolveReasoningEffort(undefined)).toBeNull();
    expect(resolveReasoningEffort("high")).toBe("high");
  });
});

describe("supportsReasoningEffortDefault", () => {
  it("knows the reasoning model families", () => {
    expect(supportsReasoningEffortDefault("gpt-5-mini")).toBe(true);
    expect(supportsReasoningEffortDefault("o3-mini")).toBe(true);
    expect(supportsReasoningEffortDefault("openai/o4-mini")).toBe(true);
    expect(supportsReasoningEffortDefault("gpt-4o-mini")).toBe(false);
    expect(supportsReasoningEffortDefault("")).toBe(false);
  });
});

describe("buildReasoningProviderOptions", () => {
  it("only sets an effort for models that take one", () => {
    expect(buildReasoningProviderOptions({ modelId: "o3-mini", effort: "high" })).toEqual({
      openai: { reasoningEffort: "high" },
    });
    expect(buildReasoningProviderOptions({ modelId: "gpt-4o-mini", effort: "high" })).toBeUndefined();
    expect(buildReasoningProviderOptions({ modelId: "o3-mini", effort: "none" })).toBeUndefined();
    expect(
      buildReasoningProviderOptions({ modelId: "custom", effort: "low", supportsReasoningEffort: () => true })
    ).toEqual({ openai: { reasoningEffort: "low" } });
  });
});
