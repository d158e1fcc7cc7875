import { Context, Data, Effect, Either, Layer, Schema } from "effect";
import { AppConfig } from "./config.js";
import type { HttpFetchError } from "./http-effect.js";
import {
  LlmClient,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatMessage,
  type ChatTool,
  type ChatToolCall,
} from "./llm-client.js";
import { Message, type AssistantMessage, type History, type ToolCall } from "./messages.js";
import type { ToolDefinition } from "./tools.js";

export class ModelResponseError extends Data.TaggedError("ModelResponseError")<{
  message: string;
  cause?: unknown;
}> {}

export type ModelError = HttpFetchError | ModelResponseError;

/**
 * The model collaborator: given the conversation so far and the tool catalog,
 * produce exactly one assistant message, possibly carrying tool calls.
 */
export type LanguageModel = {
  respond: (
    history: History,
    tools: ReadonlyArray<ToolDefinition>,
  ) => Effect.Effect<AssistantMessage, ModelError>;
};

export const LanguageModel = Context.GenericTag<LanguageModel>("LanguageModel");

export const INSTRUCTIONS = [
  "You analyze GitHub repositories by calling the available tools.",
  "Always pass the repository URL the user gave you as the `url` argument.",
  "Base every statement on tool output; never claim you read a file unless you used get_file_content.",
  "When a tool returns an error, explain it or try a different call.",
].join("\n");

// ─── History → chat messages ─────────────────────────────────────────────────

const toChatToolCall = (call: ToolCall): ChatToolCall => ({
  id: call.id,
  type: "function",
  function: { name: call.name, arguments: JSON.stringify(call.arguments) },
});

export const toChatMessages = (history: History, instructions: string): ChatMessage[] => [
  { role: "system", content: instructions },
  ...history.map(
    Message.$match({
      User: ({ text }): ChatMessage => ({ role: "user", content: text }),
      Assistant: ({ text, toolCalls }): ChatMessage => ({
        role: "assistant",
        content: text.length > 0 ? text : null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls.map(toChatToolCall) } : {}),
      }),
      ToolResult: ({ callId, content }): ChatMessage => ({
        role: "tool",
        tool_call_id: callId,
        content,
      }),
    }),
  ),
];

export const toChatTools = (tools: ReadonlyArray<ToolDefinition>): ChatTool[] =>
  tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));

// ─── Chat response → assistant message ───────────────────────────────────────

const ToolArguments = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Unknown }),
);
const decodeToolArguments = Schema.decodeUnknownEither(ToolArguments);

const parseToolCall = (call: ChatToolCall): Either.Either<ToolCall, ModelResponseError> => {
  const raw = call.function.arguments.trim();
  if (raw.length === 0) {
    return Either.right({ id: call.id, name: call.function.name, arguments: {} });
  }
  return decodeToolArguments(raw).pipe(
    Either.map((args): ToolCall => ({ id: call.id, name: call.function.name, arguments: args })),
    Either.mapLeft(
      (cause) =>
        new ModelResponseError({
          message: `Tool call ${call.id} (${call.function.name}) has arguments that are not a JSON object`,
          cause,
        }),
    ),
  );
};

export const fromChatResponse = (
  resp: ChatCompletionResponse,
): Either.Either<AssistantMessage, ModelResponseError> => {
  const choice = resp.choices[0];
  if (!choice) {
    return Either.left(new ModelResponseError({ message: "Chat completion has no choices" }));
  }

  return Either.all((choice.message.tool_calls ?? []).map(parseToolCall)).pipe(
    Either.map((toolCalls) =>
      Message.Assistant({ text: choice.message.content ?? "", toolCalls }),
    ),
  );
};

// ─── Live model ──────────────────────────────────────────────────────────────

export const makeLanguageModel = (opts: {
  client: LlmClient;
  model: string;
  instructions?: string;
}): LanguageModel => ({
  respond: (history, tools) =>
    Effect.gen(function* () {
      const body: ChatCompletionRequest = {
        model: opts.model,
        messages: toChatMessages(history, opts.instructions ?? INSTRUCTIONS),
        stream: false,
      };
      if (tools.length > 0) {
        body.tools = toChatTools(tools);
        body.tool_choice = "auto";
      }

      const { body: resp } = yield* opts.client.chatCompletions(body);
      yield* Effect.logDebug("chat completion", {
        id: resp.id,
        finishReason: resp.choices[0]?.finish_reason,
        usage: resp.usage,
      });
      return yield* fromChatResponse(resp);
    }),
});

export const LanguageModelLive = Layer.effect(
  LanguageModel,
  Effect.gen(function* () {
    const cfg = yield* AppConfig;
    const client = yield* LlmClient;
    return makeLanguageModel({ client, model: cfg.llmModel });
  }),
);
