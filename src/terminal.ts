import * as Readline from "node:readline";
import { Context, Effect, Layer, Option } from "effect";

/** Line-based console: one prompt, one answer; `None` once input has ended. */
export type Terminal = {
  readLine: (prompt: string) => Effect.Effect<Option.Option<string>>;
  print: (text: string) => Effect.Effect<void>;
};

export const Terminal = Context.GenericTag<Terminal>("Terminal");

export const makeReadlineTerminal = (
  rl: Readline.Interface,
  output: NodeJS.WritableStream,
): Terminal => {
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    readLine: (prompt) =>
      Effect.async<Option.Option<string>>((resume) => {
        if (closed) {
          resume(Effect.succeed(Option.none()));
          return;
        }
        const controller = new AbortController();
        const onClose = () => resume(Effect.succeed(Option.none()));
        rl.once("close", onClose);
        rl.question(prompt, { signal: controller.signal }, (answer) => {
          rl.off("close", onClose);
          resume(Effect.succeed(Option.some(answer)));
        });
        // Interrupted: drop the pending question and its close listener.
        return Effect.sync(() => {
          rl.off("close", onClose);
          controller.abort();
        });
      }),
    print: (text) =>
      Effect.sync(() => {
        output.write(`${text}\n`);
      }),
  };
};

export const TerminalLive = Layer.scoped(
  Terminal,
  Effect.acquireRelease(
    Effect.sync(() => Readline.createInterface({ input: process.stdin, output: process.stdout })),
    (rl) => Effect.sync(() => rl.close()),
  ).pipe(Effect.map((rl) => makeReadlineTerminal(rl, process.stdout))),
);
