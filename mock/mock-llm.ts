/**
 * Scripted LLM client for running the analyzer without real model calls.
 *
 * Scenarios return predefined replies in order (cycling when exhausted), so
 * the conversation loop, the tools and the REPL can be exercised offline and
 * in tests.
 */
import { Effect, Layer } from "effect";
import type { JsonResponse } from "../src/http-effect.js";
import {
  LlmClient,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
} from "../src/llm-client.js";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MockToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type MockResponse =
  | { type: "text"; content: string }
  | { type: "tool_call"; toolCalls: MockToolCall[]; content?: string }
  | { type: "function"; handler: (request: ChatCompletionRequest) => MockResponse };

export type MockScenario = {
  /** Human-readable name for the scenario */
  name: string;
  /** Ordered list of responses to return for each call */
  responses: MockResponse[];
};

// ─────────────────────────────────────────────────────────────────────────────
// Pre-built Mock Scenarios
// ─────────────────────────────────────────────────────────────────────────────

export const simpleTextScenario = (text: string): MockScenario => ({
  name: "simple-text",
  responses: [{ type: "text", content: text }],
});

/**
 * First calls a tool, then returns text.
 */
export const toolThenAnswerScenario = (
  toolCall: MockToolCall,
  finalAnswer: string,
): MockScenario => ({
  name: "tool-then-answer",
  responses: [
    { type: "tool_call", toolCalls: [toolCall] },
    { type: "text", content: finalAnswer },
  ],
});

/**
 * Chains tool calls, one per turn, before the final answer.
 */
export const multiToolScenario = (
  toolCalls: MockToolCall[],
  finalAnswer: string,
): MockScenario => ({
  name: "multi-tool",
  responses: [
    ...toolCalls.map((tc) => ({ type: "tool_call" as const, toolCalls: [tc] })),
    { type: "text", content: finalAnswer },
  ],
});

/**
 * Echoes back the last user message. Useful for debugging prompt construction.
 */
export const echoScenario: MockScenario = {
  name: "echo",
  responses: [
    {
      type: "function",
      handler: (req) => {
        const lastUserMsg = req.messages.findLast((m) => m.role === "user");
        const content = lastUserMsg?.content ?? "(no user message found)";
        return { type: "text", content: `Echo: ${content}` };
      },
    },
  ],
};

const DEFAULT_URL = "https://github.com/tiangolo/fastapi";

/** First URL mentioned by the user, so scripted calls target the same repository. */
export const findRepositoryUrl = (req: ChatCompletionRequest): string => {
  for (const message of req.messages) {
    if (message.role !== "user") continue;
    const match = /https?:\/\/\S+/.exec(message.content);
    if (match) return match[0];
  }
  return DEFAULT_URL;
};

/**
 * Repository overview: one turn requesting every overview tool at once,
 * then a summary built from the number of tool results received.
 */
export const repoAnalysisScenario: MockScenario = {
  name: "repo-analysis",
  responses: [
    {
      type: "function",
      handler: (req) => {
        const url = findRepositoryUrl(req);
        return {
          type: "tool_call",
          toolCalls: [
            { id: "call_info", name: "get_repo_info", arguments: { url } },
            { id: "call_languages", name: "get_repo_languages", arguments: { url } },
            { id: "call_commits", name: "get_repo_commits", arguments: { url } },
            { id: "call_branches", name: "get_repo_branches", arguments: { url } },
            { id: "call_contributors", name: "get_repo_contributors", arguments: { url } },
            { id: "call_files", name: "list_repo_files", arguments: { url, path: "" } },
          ],
        };
      },
    },
    {
      type: "function",
      handler: (req) => {
        const results = req.messages.filter((m) => m.role === "tool").length;
        return {
          type: "text",
          content: `## ${findRepositoryUrl(req)} (Mock Response)\n\nCollected ${results} tool results. Ask about any file to read it.`,
        };
      },
    },
  ],
};

// ─────────────────────────────────────────────────────────────────────────────
// Mock Client Implementation
// ─────────────────────────────────────────────────────────────────────────────

type ResolvedResponse = Exclude<MockResponse, { type: "function" }>;

const resolve = (mock: MockResponse, request: ChatCompletionRequest): ResolvedResponse =>
  mock.type === "function" ? resolve(mock.handler(request), request) : mock;

export const buildResponse = (
  mock: ResolvedResponse,
  callIndex: number,
): ChatCompletionResponse => {
  if (mock.type === "text") {
    return {
      id: `mock-${callIndex}`,
      choices: [
        {
          index: 0,
          message: { role: "assistant", content: mock.content },
          finish_reason: "stop",
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 },
    };
  }

  return {
    id: `mock-${callIndex}`,
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content: mock.content ?? null,
          tool_calls: mock.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function",
            function: {
              name: tc.name,
              arguments: JSON.stringify(tc.arguments),
            },
          })),
        },
        finish_reason: "tool_calls",
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
};

/**
 * Creates a mock LLM client that returns predefined responses. `requests`
 * records every request body, for assertions.
 */
export const createMockClient = (
  scenario: MockScenario,
): LlmClient & { requests: ChatCompletionRequest[] } => {
  let callIndex = 0;
  const requests: ChatCompletionRequest[] = [];

  return {
    requests,
    chatCompletions: (body: ChatCompletionRequest) =>
      Effect.gen(function* () {
        const mockResponse = scenario.responses[callIndex % scenario.responses.length];
        if (!mockResponse) {
          return yield* Effect.dieMessage(`Scenario "${scenario.name}" has no responses`);
        }
        callIndex++;
        requests.push(body);

        const resolved = resolve(mockResponse, body);
        yield* Effect.logDebug(
          `[MockLLM] Call #${callIndex} (${scenario.name}): ${resolved.type === "text" ? "text" : "tool_calls"}`,
        );

        return {
          body: buildResponse(resolved, callIndex),
          headers: {
            "x-mock-scenario": scenario.name,
            "x-mock-call-index": String(callIndex),
          },
        } satisfies JsonResponse<ChatCompletionResponse>;
      }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Layer Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const MockClientLayer = (scenario: MockScenario) =>
  Layer.succeed(LlmClient, createMockClient(scenario));
