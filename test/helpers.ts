import { Effect, Layer, Option } from "effect";
import type { AppConfig } from "../src/config.js";
import { EventLogSilent } from "../src/events.js";
import { GitHubClient } from "../src/github.js";
import type { FetchLike } from "../src/http-effect.js";
import { makeLanguageModel, LanguageModel } from "../src/model.js";
import { Terminal } from "../src/terminal.js";
import type { LlmClient } from "../src/llm-client.js";

export const REPO_URL = "https://github.com/octo/demo";

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Headers;
  body: string | undefined;
};

/** In-process stand-in for `fetch` that records every request. */
export const fakeFetch = (
  respond: (req: RecordedRequest, index: number) => Response,
): { fetch: FetchLike; requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    const req: RecordedRequest = {
      url,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? init.body : undefined,
    };
    requests.push(req);
    return respond(req, requests.length - 1);
  };
  return { fetch, requests };
};

export const jsonResponse = (body: unknown, status = 200, statusText = "OK") =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  githubToken: "test-secret",
  githubApiUrl: "https://api.github.com",
  llmKey: "test-secret",
  llmModel: "test-model",
  llmBaseUrl: "https://llm.example.test/v1",
  logLevel: "info",
  historyWindow: 0,
  maxSteps: 25,
  defaultRepoUrl: "https://github.com/tiangolo/fastapi",
  mockMode: false,
  ...overrides,
});

/** GitHub client whose operations all succeed with `{}` unless overridden. */
export const stubGitHub = (overrides: Partial<GitHubClient> = {}): GitHubClient => ({
  getRepoInfo: () => Effect.succeed({}),
  getRepoLanguages: () => Effect.succeed({}),
  getRepoCommits: () => Effect.succeed([]),
  getRepoBranches: () => Effect.succeed([]),
  getRepoContributors: () => Effect.succeed([]),
  listRepoFiles: () => Effect.succeed([]),
  getFileContent: () => Effect.succeed({}),
  ...overrides,
});

export const agentLayer = (client: LlmClient, github: GitHubClient = stubGitHub()) =>
  Layer.mergeAll(
    Layer.succeed(LanguageModel, makeLanguageModel({ client, model: "test-model" })),
    Layer.succeed(GitHubClient, github),
    EventLogSilent,
  );

/** Terminal fed from a fixed list of lines; input ends when the list runs out. */
export const scriptedTerminal = (lines: ReadonlyArray<string>) => {
  const pending = [...lines];
  const prompts: string[] = [];
  const output: string[] = [];
  const terminal: Terminal = {
    readLine: (prompt) =>
      Effect.sync(() => {
        prompts.push(prompt);
        const next = pending.shift();
        return next === undefined ? Option.none() : Option.some(next);
      }),
    print: (text) =>
      Effect.sync(() => {
        output.push(text);
      }),
  };
  return { prompts, output, layer: Layer.succeed(Terminal, terminal) };
};
