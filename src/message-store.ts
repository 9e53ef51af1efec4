import { InvalidProvenanceError, UnknownPersonError } from "./errors";
import { dedupePersons } from "./room-tracker";
import type { Message, MessageDraft, Person } from "./types";

// The part of the room tracker the store needs to validate provenance.
export type ProvenanceAuthority = {
  hasRoom: (roomId: string) => boolean;
  isKnownPerson: (person: Person) => boolean;
};

export type MessageStore = {
  append: (draft: MessageDraft) => number;
  history: () => Iterable<Message>;
  size: () => number;
  at: (sequenceIndex: number) => Message | undefined;
};

export const createMessageStore = (params: { rooms: ProvenanceAuthority; agentName: Person }): MessageStore => {
  const messages: Message[] = [];

  const validate = (draft: MessageDraft): Message => {
    const participants = dedupePersons(draft.participantsAtTime);
    if (!participants.length) {
      throw new InvalidProvenanceError("A message needs at least one participant present");
    }
    if (!params.rooms.hasRoom(draft.roomId)) {
      throw new InvalidProvenanceError(`Room "${draft.roomId}" is unknown`);
    }
    const stranger = participants.find((person) => !params.rooms.isKnownPerson(person));
    if (stranger !== undefined) {
      throw new UnknownPersonError(stranger);
    }
    if (draft.speaker !== params.agentName) {
      if (!params.rooms.isKnownPerson(draft.speaker)) {
        throw new UnknownPersonError(draft.speaker);
      }
      if (!participants.includes(draft.speaker)) {
        throw new InvalidProvenanceError(`"${draft.speaker}" is not present in room "${draft.roomId}"`);
      }
    }
    return Object.freeze({
      speaker: draft.speaker,
      kind: draft.kind,
      text: draft.kind === "silence" ? "" : draft.text,
      roomId: draft.roomId,
      participantsAtTime: Object.freeze(participants),
      sequenceIndex: messages.length,
    });
  };

  return {
    append: (draft) => {
      const message = validate(draft);
      messages.push(message);
      return message.sequenceIndex;
    },
    history: () => {
      // Messages are never removed, so the length at call time pins the snapshot.
      const length = messages.length;
      return {
        *[Symbol.iterator]() {
          for (let index = 0; index < length; index += 1) {
            yield messages[index];
          }
        },
      };
    },
    size: () => messages.length,
    at: (sequenceIndex) => messages[sequenceIndex],
  };
};
