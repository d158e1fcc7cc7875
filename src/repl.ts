import { Cause, Effect, Either, Exit, Option } from "effect";
import {
  askFollowUp,
  defaultLoopOptions,
  finalAnswer,
  type AgentContext,
  type LoopOptions,
  type Session,
} from "./agent.js";
import { parseRepositoryRef } from "./repository-ref.js";
import { Terminal } from "./terminal.js";
import { describeError } from "./tools.js";

const RULE = "=".repeat(80);

export const GOODBYE = "Thanks for exploring! Goodbye!";

export const isExitCommand = (input: string): boolean => input.trim().toLowerCase() === "exit";

export const banner = (title: string): string => [RULE, title, RULE].join("\n");

/**
 * Ask for the repository to analyze. A blank answer selects `defaultUrl`;
 * an unparseable one is reported and asked again. `None` when input ends.
 */
export const promptRepositoryUrl = (
  defaultUrl: string,
): Effect.Effect<Option.Option<string>, never, Terminal> =>
  Effect.gen(function* () {
    const terminal = yield* Terminal;
    while (true) {
      const answer = yield* terminal.readLine(
        `\nEnter GitHub repository URL (e.g., ${defaultUrl}): `,
      );
      if (Option.isNone(answer)) return Option.none();

      const url = answer.value.trim();
      if (url.length === 0) {
        yield* terminal.print(`Using default repository: ${defaultUrl}`);
        return Option.some(defaultUrl);
      }
      const ref = parseRepositoryRef(url);
      if (Either.isRight(ref)) return Option.some(url);
      yield* terminal.print(ref.left.message);
    }
  });

export const printAnalysis = (session: Session): Effect.Effect<void, never, Terminal> =>
  Effect.gen(function* () {
    const terminal = yield* Terminal;
    yield* terminal.print(`\n${banner("=== INITIAL REPOSITORY ANALYSIS ===")}`);
    yield* terminal.print(finalAnswer(session.history));
  });

const EXPLORER_HELP = [
  "",
  "Now you can ask me to analyze specific files from the repository.",
  "Examples:",
  "  - Read README.md",
  "  - Show me the pyproject.toml",
  "  - Analyze main.py in the src folder",
  "  - What's in requirements.txt",
  "  - Type 'exit' to quit",
  "",
].join("\n");

/**
 * Follow-up question loop. Each question extends the session; a failed turn,
 * defects included, is reported and the session continues from the history
 * before it. Returns
 * the final session on `exit` or end of input.
 */
export const interactiveExplorer = (
  session: Session,
  options: LoopOptions = defaultLoopOptions,
): Effect.Effect<Session, never, Terminal | AgentContext> =>
  Effect.gen(function* () {
    const terminal = yield* Terminal;
    yield* terminal.print(`\n${banner("=== INTERACTIVE FILE EXPLORER ===")}`);
    yield* terminal.print(EXPLORER_HELP);

    let current = session;
    while (true) {
      const line = yield* terminal.readLine("You: ");
      if (Option.isNone(line) || isExitCommand(line.value)) {
        yield* terminal.print(GOODBYE);
        return current;
      }

      const question = line.value.trim();
      if (question.length === 0) continue;

      const turn = yield* Effect.exit(askFollowUp(current, question, options));
      if (Exit.isFailure(turn)) {
        const error = Cause.squash(turn.cause);
        yield* Effect.logWarning("follow-up failed", { cause: Cause.pretty(turn.cause) });
        yield* terminal.print(`\nError: ${describeError(error)}\n`);
        continue;
      }
      current = turn.value;
      yield* terminal.print(`\nAssistant: ${finalAnswer(current.history)}\n`);
    }
  });
