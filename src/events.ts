import { Effect, Layer } from "effect";

export type ToolEvent =
  | { type: "tool:start"; tool: string; callId: string; input: unknown }
  | {
      type: "tool:success";
      tool: string;
      callId: string;
      durationMs: number;
      outputSummary: unknown;
    }
  | { type: "tool:error"; tool: string; callId: string; durationMs: number; error: string };

export type AgentEvent =
  | { type: "agent:thinking"; step: number; messages: number; sent: number }
  | { type: "agent:route"; step: number; route: "tools" | "end"; toolCalls: number };

export type LoopEvent = ToolEvent | AgentEvent;

const logEvent = (event: LoopEvent) =>
  event.type.startsWith("tool:")
    ? Effect.log("tool event", { event })
    : Effect.logDebug("agent event", { event });

export class EventLog extends Effect.Service<EventLog>()("EventLog", {
  accessors: true,
  succeed: {
    emit: (event: LoopEvent): Effect.Effect<void> => logEvent(event),
  },
}) {}

export const EventLogLive = EventLog.Default;

export const EventLogSilent = Layer.succeed(
  EventLog,
  EventLog.make({ emit: () => Effect.void }),
);
