import { describe, expect, it } from "vitest";

import { parseCliArgs } from "./cli-args";

describe("parseCliArgs", () => {
  it("reads the scenario path and flags", () => {
    expect(
      parseCliArgs(["scenarios/surprise-party.json", "-t", "--log-file", "out.md", "-m", "gpt-5-mini", "--timeout", "3000", "--strict"])
    ).toEqual({
      scenarioPath: "scenarios/surprise-party.json",
      showThoughts: true,
      logFile: "out.md",
      model: "gpt-5-mini",
      timeoutMs: 3000,
      strict: true,
      debug: false,
    });
  });

  it("takes an audit export path", () => {
    expect(parseCliArgs(["a.json", "--audit", "history.ndjson"]).auditFile).toBe("history.ndjson");
    expect(() => parseCliArgs(["a.json", "--audit"])).toThrow("--audit needs a value");
  });

  it("requires a scenario file", () => {
    expect(() => parseCliArgs(["--debug"])).toThrow("A scenario file is required");
  });

  it("rejects flags missing their value", () => {
    expect(() => parseCliArgs(["a.json", "--model"])).toThrow("--model needs a value");
    expect(() => parseCliArgs(["a.json", "-k", "--debug"])).toThrow("-k needs a value");
  });

  it("rejects unknown options and extra arguments", () => {
    expect(() => parseCliArgs(["a.json", "--loud"])).toThrow("Unknown option --loud");
    expect(() => parseCliArgs(["a.json", "b.json"])).toThrow("Unexpected argument b.json");
    expect(() => parseCliArgs(["a.json", "--timeout", "soon"])).toThrow("--timeout must be a positive integer");
  });
});
