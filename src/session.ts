import { parseSessionSettings } from "./config";
import type { SessionSettingsInput } from "./config";
import { buildContextView } from "./context";
import { createDecisionEngine } from "./decision";
import type { Deliberator } from "./deliberation";
import { ConfigurationError, DecisionInProgressError, NoOpenRoomError, describeError } from "./errors";
import { createMessageStore } from "./message-store";
import { createRoomTracker } from "./room-tracker";
import type {
  ContextView,
  DecisionOutcome,
  DecisionResult,
  DecisionState,
  EngineLogger,
  Message,
  Person,
  Room,
} from "./types";

export type SessionOptions = SessionSettingsInput & {
  deliberator: Deliberator;
  logger?: EngineLogger;
  onThoughts?: (payload: { rationale: string; inbound: Message }) => void;
  onDecision?: (payload: { inbound: Message; result: DecisionResult; recorded: Message }) => void;
  onTransition?: (from: DecisionState, to: DecisionState) => void;
};

export type AgentSession = {
  readonly agentName: string;
  readonly decisionState: DecisionState;
  allPersons: () => Person[];
  openRoom: (roomId: string, participants: Iterable<Person>) => Room;
  closeRoom: () => Room;
  currentRoom: () => Room | null;
  observe: (speaker: Person, text: string, options?: { signal?: AbortSignal }) => Promise<DecisionOutcome>;
  contextView: () => ContextView;
  historySnapshot: () => readonly Message[];
  finish: () => readonly Message[];
};

export const configure = (options: SessionOptions): AgentSession => {
  if (typeof options.deliberator !== "function") {
    throw new ConfigurationError("A deliberator is required");
  }
  const settings = parseSessionSettings({
    agentName: options.agentName,
    allPersons: options.allPersons,
    instructions: options.instructions,
    disclosureMode: options.disclosureMode,
    deadlineMs: options.deadlineMs,
  });
  const agentName = settings.agentName;
  const tracker = createRoomTracker({ allPersons: settings.allPersons });
  const store = createMessageStore({ rooms: tracker, agentName });
  const engine = createDecisionEngine({
    agentName,
    instructions: settings.instructions,
    deliberator: options.deliberator,
    deadlineMs: settings.deadlineMs,
    logger: options.logger,
    onThoughts: options.onThoughts,
    onTransition: options.onTransition,
  });

  const assertIdle = (operation: string) => {
    if (engine.state !== "idle") {
      throw new DecisionInProgressError(operation);
    }
  };

  const contextView = () =>
    buildContextView({ store, tracker, agentName, disclosureMode: settings.disclosureMode });

  const historySnapshot = () => Object.freeze(Array.from(store.history()));

  const openRoom = (roomId: string, participants: Iterable<Person>) => {
    assertIdle("openRoom");
    const room = tracker.openRoom(roomId, participants);
    options.logger?.info("[room-engine] room opened id=%s participants=%s", room.roomId, room.participants.join(","));
    return room;
  };

  const closeRoom = () => {
    assertIdle("closeRoom");
    const room = tracker.closeRoom();
    options.logger?.info("[room-engine] room closed id=%s", room.roomId);
    return room;
  };

  const observe: AgentSession["observe"] = async (speaker, text, observeOptions) => {
    assertIdle("observe");
    const room = tracker.currentRoom();
    if (!room) {
      throw new NoOpenRoomError("observe");
    }
    const inboundIndex = store.append({
      speaker,
      kind: "utterance",
      text,
      roomId: room.roomId,
      participantsAtTime: room.participants,
    });
    const inbound = store.at(inboundIndex);
    if (!inbound) {
      throw new Error(`Message ${inboundIndex} missing right after append`);
    }

    const result = await engine.decide({ inbound, context: contextView(), signal: observeOptions?.signal });
    const recordedIndex = store.append({
      speaker: agentName,
      kind: result.outcome.type === "spoken" ? "utterance" : "silence",
      text: result.outcome.type === "spoken" ? result.outcome.text : "",
      roomId: room.roomId,
      participantsAtTime: room.participants,
    });
    const recorded = store.at(recordedIndex);
    if (recorded && options.onDecision) {
      try {
        options.onDecision({ inbound, result, recorded });
      } catch (error) {
        options.logger?.warn?.("[room-engine] onDecision hook failed: %s", describeError(error));
      }
    }
    options.logger?.info(
      "[room-engine] decision room=%s inbound=%d outcome=%s trace=%s",
      room.roomId,
      inbound.sequenceIndex,
      result.outcome.type,
      result.trace.join(">")
    );
    return result.outcome;
  };

  return {
    agentName,
    get decisionState() {
      return engine.state;
    },
    allPersons: () => tracker.allPersons(),
    openRoom,
    closeRoom,
    currentRoom: () => tracker.currentRoom(),
    observe,
    contextView,
    historySnapshot,
    finish: () => {
      if (tracker.currentRoom()) closeRoom();
      return historySnapshot();
    },
  };
};
