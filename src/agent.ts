/**
 * Tool-calling conversation loop.
 *
 *   Thinking ──(assistant has tool calls)──▶ Acting ──▶ Thinking
 *      │
 *      └──(no tool calls)──▶ Done
 *
 * Thinking sends the (retention-filtered) history to the model and appends its
 * reply. Acting runs every requested tool in order and appends one ToolResult
 * per call. The stored history only ever grows.
 */
import { Data, Effect } from "effect";
import type { AppConfig } from "./config.js";
import { EventLog } from "./events.js";
import type { GitHubClient } from "./github.js";
import {
  Message,
  append,
  finalAnswer,
  type History,
  type ToolCall,
} from "./messages.js";
import { LanguageModel, type ModelError } from "./model.js";
import {
  formatRepositoryRef,
  parseRepositoryRef,
  type InvalidRepositoryReference,
} from "./repository-ref.js";
import { keepAll, retentionFromWindow, type RetentionPolicy } from "./retention.js";
import { executeToolCalls, toolDefinitions } from "./tools.js";

export { finalAnswer };

export class StepLimitExceeded extends Data.TaggedError("StepLimitExceeded")<{
  maxSteps: number;
  message: string;
}> {}

export type AgentError = ModelError | StepLimitExceeded;

export type AgentContext = LanguageModel | GitHubClient | EventLog;

export type LoopOptions = {
  /** Upper bound on model calls in one run. */
  maxSteps: number;
  retention: RetentionPolicy;
};

export const defaultLoopOptions: LoopOptions = {
  maxSteps: 25,
  retention: keepAll,
};

export const loopOptionsFromConfig = (cfg: AppConfig): LoopOptions => ({
  maxSteps: cfg.maxSteps,
  retention: retentionFromWindow(cfg.historyWindow),
});

export type Session = {
  readonly repoUrl: string;
  readonly history: History;
};

type LoopState = Data.TaggedEnum<{
  Thinking: { readonly history: History; readonly steps: number };
  Acting: {
    readonly history: History;
    readonly steps: number;
    readonly calls: ReadonlyArray<ToolCall>;
  };
  Done: { readonly history: History };
}>;

const LoopState = Data.taggedEnum<LoopState>();

const step = (
  state: LoopState,
  options: LoopOptions,
): Effect.Effect<LoopState, AgentError, AgentContext> =>
  Effect.gen(function* () {
    const events = yield* EventLog;

    switch (state._tag) {
      case "Thinking": {
        if (state.steps >= options.maxSteps) {
          return yield* new StepLimitExceeded({
            maxSteps: options.maxSteps,
            message: `Stopped after ${options.maxSteps} model calls without a final answer`,
          });
        }
        const model = yield* LanguageModel;
        const sent = options.retention(state.history);
        yield* events.emit({
          type: "agent:thinking",
          step: state.steps + 1,
          messages: state.history.length,
          sent: sent.length,
        });

        const reply = yield* model.respond(sent, toolDefinitions);
        const history = append(state.history, reply);
        const route = reply.toolCalls.length > 0 ? "tools" : "end";
        yield* events.emit({
          type: "agent:route",
          step: state.steps + 1,
          route,
          toolCalls: reply.toolCalls.length,
        });

        return route === "tools"
          ? LoopState.Acting({ history, steps: state.steps + 1, calls: reply.toolCalls })
          : LoopState.Done({ history });
      }
      case "Acting": {
        const results = yield* executeToolCalls(state.calls);
        return LoopState.Thinking({
          history: append(state.history, ...results),
          steps: state.steps,
        });
      }
      case "Done":
        return state;
    }
  });

/** Drive the loop from Thinking until the model answers without tool calls. */
export const runSession = (
  history: History,
  options: LoopOptions = defaultLoopOptions,
): Effect.Effect<History, AgentError, AgentContext> => {
  const initial: LoopState = LoopState.Thinking({ history, steps: 0 });
  return Effect.iterate<LoopState, AgentContext, AgentError>(initial, {
    while: (state) => state._tag !== "Done",
    body: (state) => step(state, options),
  }).pipe(
    Effect.map((state) => state.history),
    Effect.withSpan("runSession"),
  );
};

export const analysisPrompt = (repoUrl: string): string =>
  [
    `Analyze ${repoUrl} and give me a comprehensive summary.`,
    "",
    "Make sure to:",
    "1. Get basic repository information",
    "2. Check the programming languages used",
    "3. Review recent commits",
    "4. Look at the branches",
    "5. See who the main contributors are",
    "6. Browse the repository structure and list files",
    "",
    "After listing files, I will ask you to analyze specific files.",
  ].join("\n");

/** Start a session with the standard repository overview request. */
export const runAnalysis = (
  repoUrl: string,
  options: LoopOptions = defaultLoopOptions,
): Effect.Effect<Session, AgentError | InvalidRepositoryReference, AgentContext> =>
  Effect.gen(function* () {
    const ref = yield* parseRepositoryRef(repoUrl);
    yield* Effect.logInfo("starting analysis", { repo: formatRepositoryRef(ref) });
    const history = yield* runSession([Message.User({ text: analysisPrompt(repoUrl) })], options);
    return { repoUrl, history };
  });

/** Continue a session with a free-text question. */
export const askFollowUp = (
  session: Session,
  question: string,
  options: LoopOptions = defaultLoopOptions,
): Effect.Effect<Session, AgentError, AgentContext> =>
  runSession(append(session.history, Message.User({ text: question })), options).pipe(
    Effect.map((history) => ({ ...session, history })),
  );
