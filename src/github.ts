/**
 * GitHub REST API client behind the repository tools.
 *
 * Each operation takes a repository URL, parses it into an owner/name pair and
 * issues exactly one GET. Responses are returned as the API sent them; there
 * is no retry, cache or pagination.
 */
import { Context, Effect, Layer } from "effect";
import { z } from "zod";
import { AppConfig } from "./config.js";
import { requestJson, type FetchLike, type HttpFetchError } from "./http-effect.js";
import {
  InvalidRepositoryReference,
  parseRepositoryRef,
  type RepositoryRef,
} from "./repository-ref.js";

export { InvalidRepositoryReference, parseRepositoryRef, type RepositoryRef };

export type GitHubError = HttpFetchError | InvalidRepositoryReference;

export type FileContent = {
  file_path: string;
  content: string;
};

export type GitHubClient = {
  getRepoInfo: (url: string) => Effect.Effect<unknown, GitHubError>;
  getRepoLanguages: (url: string) => Effect.Effect<unknown, GitHubError>;
  getRepoCommits: (url: string) => Effect.Effect<unknown, GitHubError>;
  getRepoBranches: (url: string) => Effect.Effect<unknown, GitHubError>;
  getRepoContributors: (url: string) => Effect.Effect<unknown, GitHubError>;
  listRepoFiles: (url: string, path?: string) => Effect.Effect<unknown, GitHubError>;
  /** Resolves to a `FileContent` when the response carries encoded content. */
  getFileContent: (url: string, filePath: string) => Effect.Effect<unknown, GitHubError>;
};

export const GitHubClient = Context.GenericTag<GitHubClient>("GitHubClient");

export type GitHubClientOptions = {
  token: string;
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export const COMMITS_PAGE_SIZE = 10;
const TIMEOUT_MS = 30_000;
const API_VERSION = "2022-11-28";

const EncodedFile = z.object({ content: z.string() });

/** Decode a base64 transport payload to text; invalid UTF-8 becomes U+FFFD. */
export const decodeBase64Text = (encoded: string): string =>
  Buffer.from(encoded, "base64").toString("utf8");

/**
 * Turn a contents-API response into `{ file_path, content }`. Responses
 * without a string `content` field (directories, errors) pass through as-is.
 */
export const decodeFileContent = (
  filePath: string,
  response: unknown,
): unknown => {
  const parsed = EncodedFile.safeParse(response);
  if (!parsed.success) return response;
  const file: FileContent = {
    file_path: filePath,
    content: decodeBase64Text(parsed.data.content),
  };
  return file;
};

const contentsPath = (path: string): string => {
  const segments = path
    .split("/")
    .filter((s) => s.length > 0)
    .map(encodeURIComponent);
  return segments.length === 0 ? "/contents" : `/contents/${segments.join("/")}`;
};

export const makeGitHubClient = (opts: GitHubClientOptions): GitHubClient => {
  const baseUrl = opts.baseUrl.replace(/\/+$/, "");
  const timeoutMs = opts.timeoutMs ?? TIMEOUT_MS;
  const headers = {
    authorization: `Bearer ${opts.token}`,
    accept: "application/vnd.github+json",
    "x-github-api-version": API_VERSION,
    "user-agent": "github-repo-analyzer",
  };

  const get = (ref: RepositoryRef, suffix = "") =>
    requestJson(
      `${baseUrl}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}${suffix}`,
      { method: "GET", headers },
      timeoutMs,
      opts.fetch,
    ).pipe(
      Effect.map((resp) => resp.body),
      Effect.tap(() => Effect.logDebug("github request", { ref, suffix })),
    );

  return {
    getRepoInfo: Effect.fn("getRepoInfo")(function* (url: string) {
      return yield* get(yield* parseRepositoryRef(url));
    }),
    getRepoLanguages: Effect.fn("getRepoLanguages")(function* (url: string) {
      return yield* get(yield* parseRepositoryRef(url), "/languages");
    }),
    getRepoCommits: Effect.fn("getRepoCommits")(function* (url: string) {
      return yield* get(yield* parseRepositoryRef(url), `/commits?per_page=${COMMITS_PAGE_SIZE}`);
    }),
    getRepoBranches: Effect.fn("getRepoBranches")(function* (url: string) {
      return yield* get(yield* parseRepositoryRef(url), "/branches");
    }),
    getRepoContributors: Effect.fn("getRepoContributors")(function* (url: string) {
      return yield* get(yield* parseRepositoryRef(url), "/contributors");
    }),
    listRepoFiles: Effect.fn("listRepoFiles")(function* (url: string, path = "") {
      return yield* get(yield* parseRepositoryRef(url), contentsPath(path));
    }),
    getFileContent: Effect.fn("getFileContent")(function* (url: string, filePath: string) {
      const raw = yield* get(yield* parseRepositoryRef(url), contentsPath(filePath));
      return decodeFileContent(filePath, raw);
    }),
  };
};

export const GitHubClientLive = Layer.effect(
  GitHubClient,
  Effect.map(AppConfig, (cfg) =>
    makeGitHubClient({ token: cfg.githubToken, baseUrl: cfg.githubApiUrl }),
  ),
);
