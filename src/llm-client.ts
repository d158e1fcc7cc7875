import { Context, Effect, Either, Layer, Schema } from "effect";
import { AppConfig } from "./config.js";
import {
  HttpError,
  NetworkError,
  ParseError,
  isRetriableStatus,
  requestJson,
  retrySchedule,
  type FetchLike,
  type HttpFetchError,
  type JsonResponse,
} from "./http-effect.js";

const ChatToolCall = Schema.Struct({
  id: Schema.String,
  type: Schema.Literal("function"),
  function: Schema.Struct({ name: Schema.String, arguments: Schema.String }),
});

export type ChatToolCall = typeof ChatToolCall.Type;

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export type ChatTool = {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters: unknown;
  };
};

export type ChatToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  tools?: ChatTool[];
  tool_choice?: ChatToolChoice;
  temperature?: number;
  max_tokens?: number;
  stream?: false;
};

const ChatCompletionResponse = Schema.Struct({
  id: Schema.optional(Schema.String),
  choices: Schema.Array(
    Schema.Struct({
      index: Schema.optional(Schema.Number),
      message: Schema.Struct({
        role: Schema.Literal("assistant"),
        content: Schema.optional(Schema.NullOr(Schema.String)),
        tool_calls: Schema.optional(Schema.Array(ChatToolCall)),
      }),
      finish_reason: Schema.optional(Schema.NullOr(Schema.String)),
    }),
  ),
  usage: Schema.optional(
    Schema.Struct({
      prompt_tokens: Schema.optional(Schema.Number),
      completion_tokens: Schema.optional(Schema.Number),
      total_tokens: Schema.optional(Schema.Number),
    }),
  ),
});

export type ChatCompletionResponse = typeof ChatCompletionResponse.Type;

const decodeChatCompletion = Schema.decodeUnknownEither(ChatCompletionResponse);

/** OpenAI-compatible `/chat/completions` transport (OpenRouter by default). */
export type LlmClient = {
  chatCompletions: (
    body: ChatCompletionRequest,
  ) => Effect.Effect<JsonResponse<ChatCompletionResponse>, HttpFetchError>;
};

export const LlmClient = Context.GenericTag<LlmClient>("LlmClient");

const MAX_RETRIES = 3;
const TIMEOUT_MS = 60_000;

export const makeLlmClient = (opts: {
  apiKey: string;
  baseUrl: string;
  fetch?: FetchLike;
}): LlmClient => {
  const url = `${opts.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  const request = (body: ChatCompletionRequest) =>
    requestJson(
      url,
      {
        method: "POST",
        headers: {
          authorization: `Bearer ${opts.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(body),
      },
      TIMEOUT_MS,
      opts.fetch,
    ).pipe(
      Effect.flatMap((resp) =>
        decodeChatCompletion(resp.body).pipe(
          Either.map((body) => ({ body, headers: resp.headers })),
          Either.mapLeft(
            (issue) =>
              new ParseError({
                message: `Chat completion response has an unexpected shape: ${issue.message}`,
                bodyText: JSON.stringify(resp.body),
              }),
          ),
        ),
      ),
    );

  const schedule = retrySchedule<HttpFetchError>({
    baseMs: 200,
    maxRetries: MAX_RETRIES,
    shouldRetry: (err) => {
      if (err instanceof NetworkError) return true;
      if (err instanceof HttpError) return isRetriableStatus(err.status);
      return false;
    },
  });

  return {
    chatCompletions: (body) =>
      request(body).pipe(
        Effect.tapError((err) => Effect.logWarning("chat completion failed", { tag: err._tag })),
        Effect.retry(schedule),
      ),
  };
};

export const LlmClientLive = Layer.effect(
  LlmClient,
  Effect.map(AppConfig, (cfg) => makeLlmClient({ apiKey: cfg.llmKey, baseUrl: cfg.llmBaseUrl })),
);
