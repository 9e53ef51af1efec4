import type { Message } from "./types";

export const serializeMessage = (message: Message) =>
  JSON.stringify({
    sequenceIndex: message.sequenceIndex,
    roomId: message.roomId,
    speaker: message.speaker,
    kind: message.kind,
    text: message.text,
    participantsAtTime: message.participantsAtTime,
  });

export const toNdjson = (messages: Iterable<Message>) => Array.from(messages, serializeMessage).join("\n");

// Answers "did the agent decline to answer in this room?" from the recorded history.
export const silencesIn = (messages: Iterable<Message>, params: { roomId: string; agentName: string }) =>
  Array.from(messages).filter(
    (message) => message.roomId === params.roomId && message.speaker === params.agentName && message.kind === "silence"
  );
