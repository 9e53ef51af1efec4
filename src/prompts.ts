import { renderHistoryLines } from "./context";
import type { RoomTextMessage } from "./llm/types";
import type { ContextView, Message } from "./types";

const escapeXml = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

const renderXmlTag = (tag: string, value: string) => `<${tag}>${escapeXml(value)}</${tag}>`;

const renderList = (tag: string, values: string[]) =>
  values.length ? `  ${renderXmlTag(tag, values.join(", "))}` : `  <${tag}>(nobody)</${tag}>`;

const renderRosterXml = (context: ContextView) =>
  [
    "<roster>",
    renderList("all_persons", [...context.currentParticipants, ...context.absentPersons]),
    renderList("present_can_hear_you", context.currentParticipants),
    renderList("absent_cannot_hear_you", context.absentPersons),
    "</roster>",
  ].join("\n");

const renderPrivacyRulesXml = () =>
  [
    "<privacy>",
    "  <rule>You remember everything from every room you were part of.</rule>",
    "  <rule>Only share information with people who were present when it was discussed.</rule>",
    "  <rule>History headers tell you who was present in each room and who of the current room was absent then.</rule>",
    "  <rule>If someone asks about a topic discussed while they were absent, be very careful.</rule>",
    "  <rule>Consider whether sharing would break someone's privacy or trust. When unsure, be discreet.</rule>",
    "</privacy>",
  ].join("\n");

const renderProcessXml = () =>
  [
    "<process>",
    "  <phase id=\"1\">Think privately in first person, 3-5 sentences of natural self-talk.",
    "  Who is here, who is not, what do I know from other rooms, was this person present when it was said,",
    "  would sharing it betray someone, should I speak at all?</phase>",
    "  <phase id=\"2\">Only after thinking, decide: say something short (1-3 casual sentences, no lists)",
    "  or stay silent. You do not need to comment on everything.</phase>",
    "</process>",
  ].join("\n");

const OUTPUT_FORMAT = [
  "<output_format>",
  "Return ONLY one minified JSON object:",
  '{"thoughts":"<phase 1 self-talk>","action":"say"|"silent","message":"<what you say, omit when silent>"}',
  "</output_format>",
].join("\n");

export const buildDeliberationSystemPrompt = (params: {
  agentName: string;
  context: ContextView;
  instructions: string;
}) =>
  [
    `You are ${params.agentName}, a regular member of several separate group chats with different combinations of people.`,
    "People sometimes address one person by name and sometimes the whole group. Respond naturally when it makes sense.",
    renderRosterXml(params.context),
    renderPrivacyRulesXml(),
    params.instructions.trim() ? `<instructions>\n${escapeXml(params.instructions.trim())}\n</instructions>` : "",
    renderProcessXml(),
    OUTPUT_FORMAT,
  ]
    .filter(Boolean)
    .join("\n\n");

export const buildDeliberationMessages = (params: {
  agentName: string;
  context: ContextView;
  instructions: string;
  inbound: Message;
}): RoomTextMessage[] => {
  // The inbound message is already the last history entry; it is repeated so the model knows what to answer.
  const historyLines = renderHistoryLines(params.context);
  const promptBlocks = [
    `CURRENT_ROOM: ${params.context.roomId}`,
    historyLines.length ? `HISTORY:\n${historyLines.join("\n")}` : "",
    `NEW_MESSAGE: ${params.inbound.speaker}: ${params.inbound.text}`,
  ].filter(Boolean);

  return [
    { role: "system", content: buildDeliberationSystemPrompt(params) },
    { role: "user", content: promptBlocks.join("\n\n") },
  ];
};
