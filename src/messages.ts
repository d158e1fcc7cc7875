import { Data } from "effect";

export type ToolCall = {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
};

export type Message = Data.TaggedEnum<{
  User: { readonly text: string };
  Assistant: { readonly text: string; readonly toolCalls: ReadonlyArray<ToolCall> };
  ToolResult: { readonly callId: string; readonly toolName: string; readonly content: string };
}>;

export const Message = Data.taggedEnum<Message>();

export type UserMessage = Extract<Message, { _tag: "User" }>;
export type AssistantMessage = Extract<Message, { _tag: "Assistant" }>;
export type ToolResultMessage = Extract<Message, { _tag: "ToolResult" }>;

/** Ordered, append-only conversation. Steps return a new, longer array. */
export type History = ReadonlyArray<Message>;

export const NO_RESPONSE = "(No AI response found)";

export const append = (history: History, ...messages: ReadonlyArray<Message>): History => [
  ...history,
  ...messages,
];

export const isAssistant = Message.$is("Assistant");
export const isToolResult = Message.$is("ToolResult");

export const lastAssistant = (history: History): AssistantMessage | undefined =>
  history.findLast(isAssistant);

/** Text of the most recent assistant message, or the `NO_RESPONSE` sentinel. */
export const finalAnswer = (history: History): string =>
  lastAssistant(history)?.text ?? NO_RESPONSE;
