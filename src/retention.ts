import { isToolResult, type History } from "./messages.js";

/**
 * Chooses which part of the history is sent to the model on each Thinking
 * step. The stored history is never shortened.
 */
export type RetentionPolicy = (history: History) => History;

export const keepAll: RetentionPolicy = (history) => history;

/**
 * Keep the opening message plus the most recent `size` messages. A window
 * that would open on a tool result is widened back to the assistant message
 * that issued the calls, so a tool round is always sent whole.
 */
export const slidingWindow =
  (size: number): RetentionPolicy =>
  (history) => {
    if (size <= 0 || history.length <= size + 1) return history;
    const [first] = history;
    if (first === undefined) return history;

    let start = history.length - size;
    while (start > 1) {
      const message = history[start];
      if (message === undefined || !isToolResult(message)) break;
      start--;
    }
    return start <= 1 ? history : [first, ...history.slice(start)];
  };

export const retentionFromWindow = (size: number): RetentionPolicy =>
  size > 0 ? slidingWindow(size) : keepAll;
