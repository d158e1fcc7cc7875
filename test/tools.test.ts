import { describe, expect, it } from "@rstest/core";
import { Effect, Either, Layer } from "effect";
import { EventLog, EventLogSilent, type LoopEvent } from "../src/events.js";
import { GitHubClient } from "../src/github.js";
import { HttpError } from "../src/http-effect.js";
import type { ToolCall } from "../src/messages.js";
import {
  decodeToolCall,
  describeError,
  executeToolCall,
  executeToolCalls,
  serializeResult,
  toolDefinitions,
  toolNames,
} from "../src/tools.js";
import { REPO_URL, stubGitHub } from "./helpers.js";

const call = (name: string, args: Record<string, unknown>, id = "call_1"): ToolCall => ({
  id,
  name,
  arguments: args,
});

const run = <A>(
  eff: Effect.Effect<A, never, GitHubClient | EventLog>,
  github = stubGitHub(),
) =>
  Effect.runPromise(
    eff.pipe(Effect.provide(Layer.mergeAll(Layer.succeed(GitHubClient, github), EventLogSilent))),
  );

const notFound = new HttpError({
  status: 404,
  statusText: "Not Found",
  bodyText: '{"message":"Not Found"}',
});

describe("tool catalog", () => {
  it("offers the seven repository tools", () => {
    expect(toolNames).toEqual([
      "get_repo_info",
      "get_repo_languages",
      "get_repo_commits",
      "get_repo_branches",
      "get_repo_contributors",
      "list_repo_files",
      "get_file_content",
    ]);
    expect(toolDefinitions.map((t) => t.name)).toEqual(toolNames);
    const fileTool = toolDefinitions.find((t) => t.name === "get_file_content");
    expect(fileTool?.parameters.required).toEqual(["url", "file_path"]);
  });

  it("rejects a name outside the catalog", () => {
    const result = decodeToolCall(call("delete_repo", { url: REPO_URL }));
    expect(Either.isLeft(result)).toBe(true);
    if (!Either.isLeft(result)) return;
    expect(result.left._tag).toBe("UnknownToolError");
    expect(result.left.message).toBe(
      `Unknown tool "delete_repo". Available tools: ${toolNames.join(", ")}`,
    );
  });

  it("reports missing arguments by field", () => {
    const result = decodeToolCall(call("get_file_content", { url: REPO_URL }));
    expect(Either.isLeft(result)).toBe(true);
    if (!Either.isLeft(result)) return;
    expect(result.left).toMatchObject({
      _tag: "ToolInputError",
      tool: "get_file_content",
      message: "Invalid input for get_file_content: file_path: Required",
    });
  });

  it("rejects an empty file_path", () => {
    const result = decodeToolCall(call("get_file_content", { url: REPO_URL, file_path: "" }));
    expect(Either.isLeft(result)).toBe(true);
    if (!Either.isLeft(result)) return;
    expect(result.left.message).toBe(
      "Invalid input for get_file_content: file_path: file_path must not be empty",
    );
  });

  it("defaults list_repo_files to the repository root", () => {
    const result = decodeToolCall(call("list_repo_files", { url: REPO_URL }));
    expect(Either.getOrNull(result)).toEqual({
      tool: "list_repo_files",
      args: { url: REPO_URL, path: "" },
    });
  });
});

describe("serializeResult", () => {
  it("indents objects and arrays as JSON", () => {
    expect(serializeResult({ Go: 10 })).toBe('{\n  "Go": 10\n}');
    expect(serializeResult(["main"])).toBe('[\n  "main"\n]');
  });

  it("stringifies everything else", () => {
    expect(serializeResult("plain")).toBe("plain");
    expect(serializeResult(42)).toBe("42");
    expect(serializeResult(null)).toBe("null");
  });
});

describe("describeError", () => {
  it("formats HTTP errors with a truncated body", () => {
    expect(describeError(notFound)).toBe('HTTP 404 Not Found: {"message":"Not Found"}');
    const long = new HttpError({ status: 500, statusText: "Server Error", bodyText: "x".repeat(600) });
    expect(describeError(long)).toBe(`HTTP 500 Server Error: ${"x".repeat(500)}...`);
  });

  it("falls back to the error message", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("text")).toBe("text");
  });
});

describe("executeToolCall", () => {
  it("serializes a successful result", async () => {
    const result = await run(
      executeToolCall(call("get_repo_languages", { url: REPO_URL })),
      stubGitHub({ getRepoLanguages: () => Effect.succeed({ TypeScript: 1200 }) }),
    );
    expect(result).toMatchObject({
      _tag: "ToolResult",
      callId: "call_1",
      toolName: "get_repo_languages",
      content: '{\n  "TypeScript": 1200\n}',
    });
  });

  it("passes path and file_path through to the client", async () => {
    const seen: string[] = [];
    await run(
      executeToolCalls([
        call("list_repo_files", { url: REPO_URL, path: "src" }, "a"),
        call("get_file_content", { url: REPO_URL, file_path: "README.md" }, "b"),
      ]),
      stubGitHub({
        listRepoFiles: (_url, path) => Effect.sync(() => seen.push(`list:${path ?? ""}`)),
        getFileContent: (_url, filePath) => Effect.sync(() => seen.push(`read:${filePath}`)),
      }),
    );
    expect(seen).toEqual(["list:src", "read:README.md"]);
  });

  it("turns a client failure into result content", async () => {
    const result = await run(
      executeToolCall(call("get_repo_info", { url: REPO_URL })),
      stubGitHub({ getRepoInfo: () => Effect.fail(notFound) }),
    );
    expect(result.content).toBe(
      'Error executing get_repo_info: HTTP 404 Not Found: {"message":"Not Found"}',
    );
  });

  it("turns a defect into result content", async () => {
    const result = await run(
      executeToolCall(call("get_repo_branches", { url: REPO_URL })),
      stubGitHub({ getRepoBranches: () => Effect.die(new Error("socket closed")) }),
    );
    expect(result.content).toBe("Error executing get_repo_branches: socket closed");
  });

  it("keeps the order and ids of the calls", async () => {
    const results = await run(
      executeToolCalls([
        call("get_repo_info", { url: REPO_URL }, "first"),
        call("nope", {}, "second"),
        call("get_repo_commits", { url: REPO_URL }, "third"),
      ]),
    );
    expect(results.map((r) => r.callId)).toEqual(["first", "second", "third"]);
    expect(results[1]?.content).toBe(
      `Error executing nope: Unknown tool "nope". Available tools: ${toolNames.join(", ")}`,
    );
  });

  it("emits start and finish events", async () => {
    const events: LoopEvent[] = [];
    const recording = Layer.succeed(
      EventLog,
      EventLog.make({ emit: (event) => Effect.sync(() => void events.push(event)) }),
    );

    await Effect.runPromise(
      executeToolCalls([
        call("get_repo_info", { url: REPO_URL }, "ok"),
        call("get_file_content", { url: REPO_URL }, "bad"),
      ]).pipe(
        Effect.provide(Layer.mergeAll(Layer.succeed(GitHubClient, stubGitHub()), recording)),
      ),
    );

    expect(events.map((e) => e.type)).toEqual([
      "tool:start",
      "tool:success",
      "tool:start",
      "tool:error",
    ]);
    expect(events[3]).toMatchObject({
      tool: "get_file_content",
      callId: "bad",
      error: "Invalid input for get_file_content: file_path: Required",
    });
  });
});
