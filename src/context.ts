import { NoOpenRoomError } from "./errors";
import type { MessageStore } from "./message-store";
import type { RoomTracker } from "./room-tracker";
import type {
  ContextEntry,
  ContextView,
  DisclosureMode,
  Message,
  ParticipantRelation,
  Person,
} from "./types";

export const classifyRelation = (
  origin: readonly Person[],
  current: readonly Person[]
): ParticipantRelation => {
  const originSet = new Set(origin);
  const currentSet = new Set(current);
  const originCoversCurrent = [...currentSet].every((person) => originSet.has(person));
  const currentCoversOrigin = [...originSet].every((person) => currentSet.has(person));
  if (originCoversCurrent && currentCoversOrigin) return "same";
  if (currentCoversOrigin) return "subset";
  if (originCoversCurrent) return "superset";
  return "disjoint";
};

const annotate = (message: Message, current: Person[]): ContextEntry => {
  const origin = new Set(message.participantsAtTime);
  const relation = classifyRelation(message.participantsAtTime, current);
  return {
    message,
    relation,
    sharedWith: current.filter((person) => origin.has(person)),
    absentAtOrigin: current.filter((person) => !origin.has(person)),
    entitled: relation === "same" || relation === "superset",
  };
};

// Strict mode drops what the current room was not entitled to hear; the agent's
// own silence markers stay since they carry no content.
const isVisible = (entry: ContextEntry, mode: DisclosureMode) =>
  mode === "advisory" || entry.entitled || entry.message.kind === "silence";

export const buildContextView = (params: {
  store: MessageStore;
  tracker: RoomTracker;
  agentName: string;
  disclosureMode?: DisclosureMode;
}): ContextView => {
  const room = params.tracker.currentRoom();
  if (!room) {
    throw new NoOpenRoomError("buildContextView");
  }
  const disclosureMode = params.disclosureMode ?? "advisory";
  const currentParticipants = [...room.participants];
  const present = new Set(currentParticipants);
  const absentPersons = params.tracker.allPersons().filter((person) => !present.has(person));

  const visibleHistory: ContextEntry[] = [];
  for (const message of params.store.history()) {
    const entry = annotate(message, currentParticipants);
    if (isVisible(entry, disclosureMode)) visibleHistory.push(entry);
  }

  return {
    roomId: room.roomId,
    agentName: params.agentName,
    currentParticipants,
    absentPersons,
    visibleHistory,
    disclosureMode,
  };
};

const renderEntryLine = (entry: ContextEntry, agentName: string) => {
  const author = entry.message.speaker === agentName ? `${agentName} (you)` : entry.message.speaker;
  if (entry.message.kind === "silence") return `#${entry.message.sequenceIndex} ${author}: [stayed silent]`;
  return `#${entry.message.sequenceIndex} ${author}: ${entry.message.text}`;
};

const renderRoomHeader = (entry: ContextEntry, currentRoomId: string) => {
  const label = entry.message.roomId === currentRoomId ? "current room" : "earlier room";
  const lines = [
    `=== Room ${entry.message.roomId} (${label}) | present: ${entry.message.participantsAtTime.join(", ")} | relation: ${entry.relation} ===`,
  ];
  if (entry.absentAtOrigin.length) {
    lines.push(`(not present then, but here now: ${entry.absentAtOrigin.join(", ")})`);
  }
  return lines;
};

// Groups consecutive messages of the same room under one header.
export const renderHistoryLines = (view: ContextView): string[] => {
  const lines: string[] = [];
  let lastRoomId: string | null = null;
  for (const entry of view.visibleHistory) {
    if (entry.message.roomId !== lastRoomId) {
      lines.push(...renderRoomHeader(entry, view.roomId));
      lastRoomId = entry.message.roomId;
    }
    lines.push(renderEntryLine(entry, view.agentName));
  }
  return lines;
};
