#!/usr/bin/env node
/**
 * Interactive GitHub repository analyzer.
 *
 * Reads GITHUB_TOKEN and the model settings from the environment (or .env),
 * asks for a repository URL, prints an initial analysis and then answers
 * follow-up questions until `exit`.
 *
 * Usage:
 *   npm start             # real model (requires LLM_API_KEY)
 *   npm run start:mock    # scripted model, real GitHub calls
 */
import "dotenv/config";
import { Cause, Effect, Exit, Layer, Option } from "effect";
import { loopOptionsFromConfig, runAnalysis } from "./agent.js";
import { AppConfig, AppConfigLive, ConfigError } from "./config.js";
import { EventLogLive } from "./events.js";
import { GitHubClientLive } from "./github.js";
import { LlmClient, LlmClientLive } from "./llm-client.js";
import { PinoLoggerLive } from "./logger.js";
import { LanguageModelLive } from "./model.js";
import { banner, interactiveExplorer, printAnalysis, promptRepositoryUrl } from "./repl.js";
import { Terminal, TerminalLive } from "./terminal.js";
import { describeError } from "./tools.js";
import { MockClientLayer, repoAnalysisScenario } from "../mock/mock-llm.js";

const LlmClientLayer = Layer.unwrapEffect(
  Effect.map(
    AppConfig,
    (cfg): Layer.Layer<LlmClient, never, AppConfig> =>
      cfg.mockMode
        ? MockClientLayer(repoAnalysisScenario)
        : LlmClientLive,
  ),
);

const LoggerLayer = Layer.unwrapEffect(Effect.map(AppConfig, (cfg) => PinoLoggerLive(cfg.logLevel)));

const AppLayer = Layer.mergeAll(
  GitHubClientLive,
  LanguageModelLive.pipe(Layer.provide(LlmClientLayer)),
  EventLogLive,
  TerminalLive,
  LoggerLayer,
).pipe(Layer.provideMerge(AppConfigLive));

const program = Effect.gen(function* () {
  const cfg = yield* AppConfig;
  const terminal = yield* Terminal;
  const options = loopOptionsFromConfig(cfg);

  yield* terminal.print(banner("INTERACTIVE GITHUB REPOSITORY ANALYZER"));
  if (cfg.mockMode) yield* terminal.print("(mock mode: scripted model replies)");

  const repoUrl = yield* promptRepositoryUrl(cfg.defaultRepoUrl);
  if (Option.isNone(repoUrl)) return;

  const session = yield* runAnalysis(repoUrl.value, options);
  yield* printAnalysis(session);
  yield* interactiveExplorer(session, options);
});

const reportFailure = (cause: Cause.Cause<unknown>): string =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => Cause.pretty(cause),
    onSome: (e) =>
      e instanceof ConfigError ? `Configuration error: ${e.message}` : `Error: ${describeError(e)}`,
  });

async function main() {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(AppLayer)));
  if (Exit.isFailure(exit)) {
    console.error(reportFailure(exit.cause));
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
