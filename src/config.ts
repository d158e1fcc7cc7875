import { bool, cleanEnv, EnvMissingError, makeValidator, str, url } from "envalid";
import { Context, Data, Effect, Layer } from "effect";

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error";

const logLevel = makeValidator<LogLevelName>((input) => {
  const lower = (input ?? "").toLowerCase();
  if (
    lower === "trace" ||
    lower === "debug" ||
    lower === "info" ||
    lower === "warn" ||
    lower === "error"
  )
    return lower;
  throw new Error(`Invalid log level: ${input}`);
});

const nonNegativeInt = makeValidator<number>((input) => {
  const n = Number(input);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Expected a non-negative integer, got "${input}"`);
  }
  return n;
});

const positiveInt = makeValidator<number>((input) => {
  const n = Number(input);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${input}"`);
  }
  return n;
});

export type AppConfig = {
  githubToken: string;
  githubApiUrl: string;
  llmKey: string;
  llmModel: string;
  llmBaseUrl: string;
  logLevel: LogLevelName;
  /** Messages sent to the model besides the first one; 0 sends everything. */
  historyWindow: number;
  maxSteps: number;
  defaultRepoUrl: string;
  mockMode: boolean;
};

export class ConfigError extends Data.TaggedError("ConfigError")<{
  key: string;
  message: string;
}> {}

export const AppConfig = Context.GenericTag<AppConfig>("AppConfig");

/** Custom reporter that throws instead of calling process.exit */
const throwingReporter = <T>({
  errors,
}: {
  errors: Partial<Record<keyof T, Error>>;
}) => {
  const [first] = Object.keys(errors);
  if (first === undefined) return;
  const error: unknown = Object.values(errors)[0];
  throw new ConfigError({
    key: first,
    message:
      error instanceof EnvMissingError || !(error instanceof Error)
        ? `Missing required env var ${first}`
        : `Invalid env var ${first}: ${error.message}`,
  });
};

const trimSlashes = (value: string) => value.replace(/\/+$/, "");

export const readAppConfig = Effect.try({
  try: () => {
    const env = cleanEnv(
      process.env,
      {
        GITHUB_TOKEN: str({ desc: "Token for the GitHub REST API" }),
        GITHUB_API_URL: url({ default: "https://api.github.com" }),
        LLM_API_KEY: str({ default: "", desc: "API key for the chat completions endpoint" }),
        LLM_MODEL: str({ default: "openai/gpt-4o-mini" }),
        LLM_BASE_URL: url({ default: "https://openrouter.ai/api/v1" }),
        LOG_LEVEL: logLevel({ default: "info" }),
        HISTORY_WINDOW: nonNegativeInt({ default: 0 }),
        AGENT_MAX_STEPS: positiveInt({ default: 25 }),
        DEFAULT_REPO_URL: str({ default: "https://github.com/tiangolo/fastapi" }),
        MOCK_MODE: bool({ default: false }),
      },
      { reporter: throwingReporter },
    );

    if (env.GITHUB_TOKEN.trim().length === 0) {
      throw new ConfigError({
        key: "GITHUB_TOKEN",
        message: "Missing required env var GITHUB_TOKEN",
      });
    }

    // The scripted model needs no key.
    if (!env.MOCK_MODE && env.LLM_API_KEY.trim().length === 0) {
      throw new ConfigError({
        key: "LLM_API_KEY",
        message: "Missing required env var LLM_API_KEY",
      });
    }

    return {
      githubToken: env.GITHUB_TOKEN,
      githubApiUrl: trimSlashes(env.GITHUB_API_URL),
      llmKey: env.LLM_API_KEY,
      llmModel: env.LLM_MODEL,
      llmBaseUrl: trimSlashes(env.LLM_BASE_URL),
      logLevel: env.LOG_LEVEL,
      historyWindow: env.HISTORY_WINDOW,
      maxSteps: env.AGENT_MAX_STEPS,
      defaultRepoUrl: env.DEFAULT_REPO_URL,
      mockMode: env.MOCK_MODE,
    } satisfies AppConfig;
  },
  catch: (e) => {
    if (e instanceof ConfigError) return e;
    const msg = e instanceof Error ? e.message : String(e);
    return new ConfigError({ key: "unknown", message: msg });
  },
});

export const AppConfigLive = Layer.effect(AppConfig, readAppConfig);
