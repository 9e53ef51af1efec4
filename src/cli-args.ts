export type CliArgs = {
  scenarioPath: string;
  showThoughts: boolean;
  logFile?: string;
  auditFile?: string;
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
  strict: boolean;
  debug: boolean;
};

export const USAGE =
  "Usage: room-disclosure <scenario.json> [--show-thoughts|-t] [--log-file|-l <path>] [--audit <path>] [--model|-m <id>] [--api-key|-k <key>] [--timeout <ms>] [--strict] [--debug|-d]";

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args = [...argv];
  const parsed: CliArgs = { scenarioPath: "", showThoughts: false, strict: false, debug: false };
  const takeValue = (flag: string) => {
    const value = args.shift();
    if (!value || value.startsWith("-")) {
      throw new Error(`${flag} needs a value`);
    }
    return value;
  };

  while (args.length) {
    const arg = args.shift() ?? "";
    switch (arg) {
      case "--show-thoughts":
      case "-t":
        parsed.showThoughts = true;
        break;
      case "--log-file":
      case "-l":
        parsed.logFile = takeValue(arg);
        break;
      case "--audit":
        parsed.auditFile = takeValue(arg);
        break;
      case "--model":
      case "-m":
        parsed.model = takeValue(arg);
        break;
      case "--api-key":
      case "-k":
        parsed.apiKey = takeValue(arg);
        break;
      case "--timeout": {
        const value = Number(takeValue(arg));
        if (!Number.isInteger(value) || value <= 0) throw new Error("--timeout must be a positive integer");
        parsed.timeoutMs = value;
        break;
      }
      case "--strict":
        parsed.strict = true;
        break;
      case "--debug":
      case "-d":
        parsed.debug = true;
        break;
      default:
        if (arg.startsWith("-")) throw new Error(`Unknown option ${arg}`);
        if (parsed.scenarioPath) throw new Error(`Unexpected argument ${arg}`);
        parsed.scenarioPath = arg;
    }
  }

  if (!parsed.scenarioPath) {
    throw new Error("A scenario file is required");
  }
  return parsed;
};
