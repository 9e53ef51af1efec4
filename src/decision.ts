import type { Deliberation, Deliberator } from "./deliberation";
import { DecisionInProgressError, ReasoningUnavailableError, describeError } from "./errors";
import { silent } from "./types";
import type { ContextView, DecisionResult, DecisionState, EngineLogger, Message } from "./types";

export type DecisionEngine = {
  readonly state: DecisionState;
  decide: (input: { inbound: Message; context: ContextView; signal?: AbortSignal }) => Promise<DecisionResult>;
};

export type DecisionEngineOptions = {
  agentName: string;
  instructions: string;
  deliberator: Deliberator;
  deadlineMs?: number;
  logger?: EngineLogger;
  onThoughts?: (payload: { rationale: string; inbound: Message }) => void;
  onTransition?: (from: DecisionState, to: DecisionState) => void;
};

const isDeliberation = (value: unknown): value is Deliberation => {
  if (!value || typeof value !== "object") return false;
  if (!("rationale" in value) || typeof value.rationale !== "string") return false;
  if (!("outcome" in value)) return false;
  const outcome = value.outcome;
  if (!outcome || typeof outcome !== "object" || !("type" in outcome)) return false;
  if (outcome.type === "silent") return true;
  return outcome.type === "spoken" && "text" in outcome && typeof outcome.text === "string";
};

const toReasoningError = (reason: unknown) =>
  reason instanceof ReasoningUnavailableError
    ? reason
    : new ReasoningUnavailableError(`Deliberation failed: ${describeError(reason)}`, { cause: reason });

// Runs `run` with a signal that aborts on the caller's signal or after `deadlineMs`,
// and rejects as soon as either fires even if `run` ignores the signal.
const runWithDeadline = async <T>(
  run: (signal: AbortSignal) => Promise<T>,
  params: { deadlineMs?: number; signal?: AbortSignal }
): Promise<T> => {
  const controller = new AbortController();
  const onCallerAbort = () => controller.abort(new ReasoningUnavailableError("Deliberation cancelled by caller"));
  if (params.signal?.aborted) onCallerAbort();
  params.signal?.addEventListener("abort", onCallerAbort, { once: true });

  const timer =
    typeof params.deadlineMs === "number" && params.deadlineMs > 0
      ? setTimeout(
          () => controller.abort(new ReasoningUnavailableError(`Deliberation exceeded ${params.deadlineMs}ms`)),
          params.deadlineMs
        )
      : null;

  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason);
      return;
    }
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([run(controller.signal), aborted]);
  } finally {
    if (timer) clearTimeout(timer);
    params.signal?.removeEventListener("abort", onCallerAbort);
  }
};

export const createDecisionEngine = (options: DecisionEngineOptions): DecisionEngine => {
  let state: DecisionState = "idle";

  // Operator hooks are observers; a throwing hook is logged and the decision goes on.
  const notify = (hook: string, call: () => void) => {
    try {
      call();
    } catch (error) {
      options.logger?.warn?.("[room-engine] %s hook failed: %s", hook, describeError(error));
    }
  };

  const transition = (next: DecisionState) => {
    const previous = state;
    state = next;
    notify("onTransition", () => options.onTransition?.(previous, next));
  };

  const decide: DecisionEngine["decide"] = async (input) => {
    if (state !== "idle") {
      throw new DecisionInProgressError("decide");
    }
    const decisionTrace: string[] = [];
    const trace = (step: string) => {
      decisionTrace.push(step);
    };
    transition("deliberating");
    trace(`deliberation:start:${input.inbound.sequenceIndex}`);

    try {
      let deliberation: Deliberation;
      try {
        const result = await runWithDeadline(
          (signal) =>
            options.deliberator(
              {
                agentName: options.agentName,
                context: input.context,
                instructions: options.instructions,
                inbound: input.inbound,
              },
              { signal }
            ),
          { deadlineMs: options.deadlineMs, signal: input.signal }
        );
        if (!isDeliberation(result)) {
          throw new ReasoningUnavailableError("Deliberation returned a malformed result");
        }
        deliberation = result;
      } catch (reason) {
        const failure = toReasoningError(reason);
        options.logger?.warn?.(
          "[room-engine] reasoning unavailable room=%s sequence=%d: %s",
          input.context.roomId,
          input.inbound.sequenceIndex,
          failure.message
        );
        trace("deliberation:failed");
        transition("silent");
        trace("outcome:silent");
        return { outcome: silent(), rationale: "", trace: decisionTrace, failure: failure.message };
      }

      trace("deliberation:done");
      if (deliberation.rationale.trim()) {
        const rationale = deliberation.rationale;
        notify("onThoughts", () => options.onThoughts?.({ rationale, inbound: input.inbound }));
      }

      const outcome = deliberation.outcome;
      if (outcome.type === "spoken" && outcome.text.trim()) {
        transition("emitting");
        trace("outcome:spoken");
        return { outcome: { type: "spoken", text: outcome.text.trim() }, rationale: deliberation.rationale, trace: decisionTrace };
      }
      transition("silent");
      trace("outcome:silent");
      return { outcome: silent(), rationale: deliberation.rationale, trace: decisionTrace };
    } finally {
      transition("idle");
    }
  };

  return {
    get state() {
      return state;
    },
    decide,
  };
};
