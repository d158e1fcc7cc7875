/**
 * Repository tool catalog offered to the model.
 *
 * The set of tools is closed: `ToolName` is a literal union derived from the
 * argument decoder, the catalog record must describe every member, and
 * dispatch is an exhaustive switch. A name outside the catalog only exists as
 * an `UnknownToolError` value that ends up in the tool result.
 */
import { Cause, Data, Effect, Either } from "effect";
import { absurd } from "effect/Function";
import { z } from "zod";
import { EventLog } from "./events.js";
import { GitHubClient, type GitHubError } from "./github.js";
import { HttpError } from "./http-effect.js";
import { Message, type ToolCall, type ToolResultMessage } from "./messages.js";

export type JsonSchema = {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolDefinition = {
  name: ToolName;
  description: string;
  parameters: JsonSchema;
};

// Each class below carries a discriminant `_tag` so callers can match on it.
export class UnknownToolError extends Data.TaggedError("UnknownToolError")<{
  tool: string;
  message: string;
}> {}

export class ToolInputError extends Data.TaggedError("ToolInputError")<{
  tool: string;
  message: string;
  input: unknown;
}> {}

export type ToolError = UnknownToolError | ToolInputError | GitHubError;

const RepoArgs = z.object({
  url: z.string().min(1, "url must not be empty"),
});

const RepoToolInvocation = z.discriminatedUnion("tool", [
  z.object({ tool: z.literal("get_repo_info"), args: RepoArgs }),
  z.object({ tool: z.literal("get_repo_languages"), args: RepoArgs }),
  z.object({ tool: z.literal("get_repo_commits"), args: RepoArgs }),
  z.object({ tool: z.literal("get_repo_branches"), args: RepoArgs }),
  z.object({ tool: z.literal("get_repo_contributors"), args: RepoArgs }),
  z.object({
    tool: z.literal("list_repo_files"),
    args: RepoArgs.extend({ path: z.string().default("") }),
  }),
  z.object({
    tool: z.literal("get_file_content"),
    args: RepoArgs.extend({ file_path: z.string().min(1, "file_path must not be empty") }),
  }),
]);

export type RepoToolInvocation = z.infer<typeof RepoToolInvocation>;
export type ToolName = RepoToolInvocation["tool"];

export const toolNames: ReadonlyArray<ToolName> = RepoToolInvocation.options.map(
  (option) => option.shape.tool.value,
);

export const isToolName = (name: string): name is ToolName =>
  toolNames.some((tool) => tool === name);

const urlProperty = {
  type: "string",
  description: "Repository URL, e.g. https://github.com/owner/repo",
};

const repoOnly: JsonSchema = {
  type: "object",
  properties: { url: urlProperty },
  required: ["url"],
  additionalProperties: false,
};

const toolCatalog: { readonly [K in ToolName]: Omit<ToolDefinition, "name"> } = {
  get_repo_info: {
    description: "Get basic info about a GitHub repository.",
    parameters: repoOnly,
  },
  get_repo_languages: {
    description: "Check what programming languages are used in the repo.",
    parameters: repoOnly,
  },
  get_repo_commits: {
    description: "Get the 10 most recent commits from the repository.",
    parameters: repoOnly,
  },
  get_repo_branches: {
    description: "See all the branches in the repository.",
    parameters: repoOnly,
  },
  get_repo_contributors: {
    description: "Find out who contributes to this repository.",
    parameters: repoOnly,
  },
  list_repo_files: {
    description:
      "Browse files and folders in the repository. Omit path (or pass an empty string) for the root.",
    parameters: {
      type: "object",
      properties: {
        url: urlProperty,
        path: { type: "string", description: "Directory path inside the repository" },
      },
      required: ["url"],
      additionalProperties: false,
    },
  },
  get_file_content: {
    description: "Read the actual content of a file in the repository.",
    parameters: {
      type: "object",
      properties: {
        url: urlProperty,
        file_path: {
          type: "string",
          minLength: 1,
          description: "File path inside the repository, e.g. README.md",
        },
      },
      required: ["url", "file_path"],
      additionalProperties: false,
    },
  },
};

export const toolDefinitions: ReadonlyArray<ToolDefinition> = toolNames.map((name) => ({
  name,
  ...toolCatalog[name],
}));

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.slice(1).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

/** Narrow a model-issued call to one catalog operation with validated arguments. */
export const decodeToolCall = (
  call: ToolCall,
): Either.Either<RepoToolInvocation, UnknownToolError | ToolInputError> => {
  if (!isToolName(call.name)) {
    return Either.left(
      new UnknownToolError({
        tool: call.name,
        message: `Unknown tool "${call.name}". Available tools: ${toolNames.join(", ")}`,
      }),
    );
  }

  const parsed = RepoToolInvocation.safeParse({ tool: call.name, args: call.arguments });
  if (!parsed.success) {
    return Either.left(
      new ToolInputError({
        tool: call.name,
        message: `Invalid input for ${call.name}: ${formatIssues(parsed.error)}`,
        input: call.arguments,
      }),
    );
  }
  return Either.right(parsed.data);
};

export const invokeTool = (
  github: GitHubClient,
  invocation: RepoToolInvocation,
): Effect.Effect<unknown, GitHubError> => {
  switch (invocation.tool) {
    case "get_repo_info":
      return github.getRepoInfo(invocation.args.url);
    case "get_repo_languages":
      return github.getRepoLanguages(invocation.args.url);
    case "get_repo_commits":
      return github.getRepoCommits(invocation.args.url);
    case "get_repo_branches":
      return github.getRepoBranches(invocation.args.url);
    case "get_repo_contributors":
      return github.getRepoContributors(invocation.args.url);
    case "list_repo_files":
      return github.listRepoFiles(invocation.args.url, invocation.args.path);
    case "get_file_content":
      return github.getFileContent(invocation.args.url, invocation.args.file_path);
    default:
      return absurd(invocation);
  }
};

/** Objects and arrays become indented JSON; everything else goes through `String`. */
export const serializeResult = (value: unknown): string =>
  typeof value === "object" && value !== null
    ? JSON.stringify(value, null, 2)
    : String(value);

export const describeError = (error: unknown): string => {
  if (error instanceof HttpError) {
    const body =
      error.bodyText.length > 500 ? `${error.bodyText.slice(0, 500)}...` : error.bodyText;
    return `HTTP ${error.status} ${error.statusText}${body ? `: ${body}` : ""}`;
  }
  if (error instanceof Error && error.message) return error.message;
  if (error instanceof Error) return error.name;
  return String(error);
};

const summarizeOutput = (value: unknown): unknown => {
  if (Array.isArray(value)) return { items: value.length };
  if (typeof value === "object" && value !== null) {
    return { keys: Object.keys(value).slice(0, 10) };
  }
  return { value: String(value).slice(0, 100) };
};

const withToolLogging = <A, E, R>(
  log: EventLog,
  call: ToolCall,
  eff: Effect.Effect<A, E, R>,
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    yield* log.emit({ type: "tool:start", tool: call.name, callId: call.id, input: call.arguments });
    const startedAt = yield* Effect.sync(() => Date.now());
    const exit = yield* Effect.exit(eff);
    const durationMs = (yield* Effect.sync(() => Date.now())) - startedAt;

    if (exit._tag === "Failure") {
      yield* log.emit({
        type: "tool:error",
        tool: call.name,
        callId: call.id,
        durationMs,
        error: describeError(Cause.squash(exit.cause)),
      });
      return yield* Effect.failCause(exit.cause);
    }

    yield* log.emit({
      type: "tool:success",
      tool: call.name,
      callId: call.id,
      durationMs,
      outputSummary: summarizeOutput(exit.value),
    });
    return exit.value;
  });

/**
 * Run one tool call to a `ToolResult`. Failures of any kind, including
 * defects, are rendered into the result content and never propagate.
 */
export const executeToolCall = (
  call: ToolCall,
): Effect.Effect<ToolResultMessage, never, GitHubClient | EventLog> =>
  Effect.gen(function* () {
    const github = yield* GitHubClient;
    const log = yield* EventLog;

    const run = Effect.flatMap(decodeToolCall(call), (invocation) =>
      invokeTool(github, invocation),
    );

    return yield* withToolLogging(log, call, run).pipe(
      Effect.map((value) =>
        Message.ToolResult({
          callId: call.id,
          toolName: call.name,
          content: serializeResult(value),
        }),
      ),
      Effect.catchAllCause((cause) =>
        Effect.succeed(
          Message.ToolResult({
            callId: call.id,
            toolName: call.name,
            content: `Error executing ${call.name}: ${describeError(Cause.squash(cause))}`,
          }),
        ),
      ),
    );
  });

/** Execute calls strictly in order, one at a time. */
export const executeToolCalls = (calls: ReadonlyArray<ToolCall>) =>
  Effect.forEach(calls, executeToolCall);
