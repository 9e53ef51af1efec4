import { describe, expect, it } from "vitest";

import { silencesIn, toNdjson } from "./audit";
import { createMessageStore } from "./message-store";
import { createRoomTracker } from "./room-tracker";

const seed = () => {
  const tracker = createRoomTracker({ allPersons: ["Jack", "Tom"] });
  const store = createMessageStore({ rooms: tracker, agentName: "Alex" });
  tracker.openRoom("1", ["Jack"]);
  store.append({ speaker: "Jack", kind: "utterance", text: "Friday is a secret", roomId: "1", participantsAtTime: ["Jack"] });
  store.append({ speaker: "Alex", kind: "utterance", text: "Noted", roomId: "1", participantsAtTime: ["Jack"] });
  tracker.closeRoom();
  tracker.openRoom("2", ["Tom"]);
  store.append({ speaker: "Tom", kind: "utterance", text: "What's on Friday?", roomId: "2", participantsAtTime: ["Tom"] });
  store.append({ speaker: "Alex", kind: "silence", text: "", roomId: "2", participantsAtTime: ["Tom"] });
  return store;
};

describe("toNdjson", () => {
  it("writes one line per message in order", () => {
    const lines = toNdjson(seed().history()).split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe(
      '{"sequenceIndex":3,"roomId":"2","speaker":"Alex","kind":"silence","text":"","participantsAtTime":["Tom"]}'
    );
  });
});

describe("silencesIn", () => {
  it("finds the agent's silences in one room", () => {
    const store = seed();
    expect(silencesIn(store.history(), { roomId: "2", agentName: "Alex" }).map((message) => message.sequenceIndex)).toEqual([3]);
    expect(silencesIn(store.history(), { roomId: "1", agentName: "Alex" })).toEqual([]);
  });
});
