import { describe, expect, it } from "@rstest/core";
import { Effect, Either } from "effect";
import type { ChatCompletionResponse } from "../src/llm-client.js";
import { Message } from "../src/messages.js";
import {
  INSTRUCTIONS,
  fromChatResponse,
  makeLanguageModel,
  toChatMessages,
} from "../src/model.js";
import { toolDefinitions } from "../src/tools.js";
import { createMockClient, simpleTextScenario } from "../mock/mock-llm.js";

const reply = (message: ChatCompletionResponse["choices"][number]["message"]): ChatCompletionResponse => ({
  choices: [{ index: 0, message, finish_reason: "stop" }],
});

describe("toChatMessages", () => {
  it("prepends the system message and maps every kind of message", () => {
    const history = [
      Message.User({ text: "hi" }),
      Message.Assistant({
        text: "",
        toolCalls: [{ id: "c1", name: "get_repo_info", arguments: { url: "u" } }],
      }),
      Message.ToolResult({ callId: "c1", toolName: "get_repo_info", content: "{}" }),
      Message.Assistant({ text: "done", toolCalls: [] }),
    ];

    expect(toChatMessages(history, "sys")).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "c1",
            type: "function",
            function: { name: "get_repo_info", arguments: '{"url":"u"}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "c1", content: "{}" },
      { role: "assistant", content: "done" },
    ]);
  });
});

describe("fromChatResponse", () => {
  it("parses tool-call arguments", () => {
    const result = fromChatResponse(
      reply({
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "c1",
            type: "function",
            function: { name: "list_repo_files", arguments: '{"url":"u","path":"src"}' },
          },
          { id: "c2", type: "function", function: { name: "get_repo_info", arguments: "" } },
        ],
      }),
    );

    expect(Either.getOrNull(result)).toEqual(
      Message.Assistant({
        text: "",
        toolCalls: [
          { id: "c1", name: "list_repo_files", arguments: { url: "u", path: "src" } },
          { id: "c2", name: "get_repo_info", arguments: {} },
        ],
      }),
    );
  });

  it("fails on arguments that are not JSON", () => {
    const result = fromChatResponse(
      reply({
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "c1", type: "function", function: { name: "get_repo_info", arguments: "{url" } },
        ],
      }),
    );
    expect(Either.isLeft(result)).toBe(true);
    if (!Either.isLeft(result)) return;
    expect(result.left.message).toBe(
      "Tool call c1 (get_repo_info) has arguments that are not a JSON object",
    );
  });

  it("fails when there are no choices", () => {
    const result = fromChatResponse({ choices: [] });
    expect(Either.isLeft(result)).toBe(true);
    if (!Either.isLeft(result)) return;
    expect(result.left.message).toBe("Chat completion has no choices");
  });
});

describe("language model", () => {
  it("sends instructions, history and the tool catalog", async () => {
    const client = createMockClient(simpleTextScenario("hello"));
    const model = makeLanguageModel({ client, model: "test-model" });

    const answer = await Effect.runPromise(
      model.respond([Message.User({ text: "hi" })], toolDefinitions),
    );

    expect(answer).toEqual(Message.Assistant({ text: "hello", toolCalls: [] }));
    const [request] = client.requests;
    expect(request?.model).toBe("test-model");
    expect(request?.messages[0]).toEqual({ role: "system", content: INSTRUCTIONS });
    expect(request?.tool_choice).toBe("auto");
    expect(request?.tools?.map((t) => t.function.name)).toEqual(
      toolDefinitions.map((t) => t.name),
    );
  });

  it("omits tools when none are offered", async () => {
    const client = createMockClient(simpleTextScenario("hello"));
    const model = makeLanguageModel({ client, model: "test-model", instructions: "be brief" });

    await Effect.runPromise(model.respond([Message.User({ text: "hi" })], []));

    const [request] = client.requests;
    expect(request?.tools).toBeUndefined();
    expect(request?.tool_choice).toBeUndefined();
    expect(request?.messages[0]).toEqual({ role: "system", content: "be brief" });
  });
});
