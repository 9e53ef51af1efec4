import { describe, expect, it } from "vitest";

import { InvalidProvenanceError, UnknownPersonError } from "./errors";
import { createMessageStore } from "./message-store";
import { createRoomTracker } from "./room-tracker";

const setup = () => {
  const tracker = createRoomTracker({ allPersons: ["Jack", "Sarah", "Tom"] });
  const store = createMessageStore({ rooms: tracker, agentName: "Alex" });
  tracker.openRoom("1", ["Jack", "Sarah"]);
  return { tracker, store };
};

describe("createMessageStore", () => {
  it("assigns global indices in arrival order across rooms", () => {
    const { tracker, store } = setup();
    const first = store.append({
      speaker: "Jack",
      kind: "utterance",
      text: "hi",
      roomId: "1",
      participantsAtTime: ["Jack", "Sarah"],
    });
    tracker.closeRoom();
    tracker.openRoom("2", ["Tom"]);
    const second = store.append({
      speaker: "Tom",
      kind: "utterance",
      text: "hey",
      roomId: "2",
      participantsAtTime: ["Tom"],
    });

    expect([first, second]).toEqual([0, 1]);
    expect(Array.from(store.history(), (message) => message.roomId)).toEqual(["1", "2"]);
  });

  it("accepts messages for a room that is already closed", () => {
    const { tracker, store } = setup();
    tracker.closeRoom();
    expect(
      store.append({ speaker: "Sarah", kind: "utterance", text: "late", roomId: "1", participantsAtTime: ["Jack", "Sarah"] })
    ).toBe(0);
  });

  it("records the agent even though it is not a listed person", () => {
    const { store } = setup();
    store.append({ speaker: "Alex", kind: "silence", text: "ignored", roomId: "1", participantsAtTime: ["Jack", "Sarah"] });
    expect(store.at(0)).toEqual({
      speaker: "Alex",
      kind: "silence",
      text: "",
      roomId: "1",
      participantsAtTime: ["Jack", "Sarah"],
      sequenceIndex: 0,
    });
  });

  it("rejects bad provenance without storing anything", () => {
    const { store } = setup();

    expect(() =>
      store.append({ speaker: "Jack", kind: "utterance", text: "x", roomId: "1", participantsAtTime: [] })
    ).toThrow(InvalidProvenanceError);
    expect(() =>
      store.append({ speaker: "Jack", kind: "utterance", text: "x", roomId: "9", participantsAtTime: ["Jack"] })
    ).toThrow(InvalidProvenanceError);
    expect(() =>
      store.append({ speaker: "Tom", kind: "utterance", text: "x", roomId: "1", participantsAtTime: ["Jack", "Sarah"] })
    ).toThrow(InvalidProvenanceError);
    expect(() =>
      store.append({ speaker: "Jack", kind: "utterance", text: "x", roomId: "1", participantsAtTime: ["Jack", "Eve"] })
    ).toThrow(UnknownPersonError);
    expect(() =>
      store.append({ speaker: "Eve", kind: "utterance", text: "x", roomId: "1", participantsAtTime: ["Jack", "Sarah"] })
    ).toThrow(UnknownPersonError);

    expect(store.size()).toBe(0);
  });

  it("serves restartable snapshots that ignore later appends", () => {
    const { store } = setup();
    store.append({ speaker: "Jack", kind: "utterance", text: "one", roomId: "1", participantsAtTime: ["Jack", "Sarah"] });
    const snapshot = store.history();
    store.append({ speaker: "Sarah", kind: "utterance", text: "two", roomId: "1", participantsAtTime: ["Jack", "Sarah"] });

    expect(Array.from(snapshot, (message) => message.text)).toEqual(["one"]);
    expect(Array.from(snapshot, (message) => message.text)).toEqual(["one"]);
    expect(Array.from(store.history(), (message) => message.text)).toEqual(["one", "two"]);
  });

  it("stores frozen messages with their own participant copy", () => {
    const { store } = setup();
    const participants = ["Jack", "Sarah"];
    store.append({ speaker: "Jack", kind: "utterance", text: "one", roomId: "1", participantsAtTime: participants });
    participants.push("Tom");

    const stored = store.at(0);
    expect(stored?.participantsAtTime).toEqual(["Jack", "Sarah"]);
    expect(Object.isFrozen(stored)).toBe(true);
  });
});
