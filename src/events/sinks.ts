import type { ChainEvent, EventSink } from "../types/events.js";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export interface MemorySink extends EventSink {
  events: ChainEvent[];
}

export function createMemorySink(): MemorySink {
  const events: ChainEvent[] = [];
  return { events, emit: (event) => { events.push(event); } };
}

export function combineSinks(...sinks: EventSink[]): EventSink {
  return { emit: (event) => { for (const s of sinks) s.emit(event); } };
}

export interface ConsoleSinkOptions {
  steps?: boolean;
  events?: boolean;
}

export function formatEvent(event: ChainEvent): string {
  switch (event.type) {
    case "chain_started":
      return `${COLOR.cyan("▶ chain")} ${event.chain_name ?? event.chain_id} ${COLOR.gray(`(${event.mode}, ${event.step_count} steps)`)}`;
    case "step_started": {
      const retry = event.attempt > 1 ? COLOR.yellow(` attempt ${event.attempt}`) : "";
      return `${COLOR.cyan("  ▶ step")} ${event.index + 1}/${event.total} ${event.step} ${COLOR.gray("— " + event.operation)}${retry}`;
    }
    case "step_finished":
      return event.status === "success"
        ? `${COLOR.green("  ✓ done")} ${event.step} ${COLOR.gray(`(${fmtMs(event.duration_ms)}; ${event.summary})`)}`
        : `${COLOR.yellow("  ✗ failed")} ${event.step} ${COLOR.gray(`(${fmtMs(event.duration_ms)}; ${event.summary})`)}`;
    case "chain_finished": {
      const paint = event.status === "completed" ? COLOR.green : event.status === "failed" ? COLOR.red : COLOR.yellow;
      return `${paint(`■ ${event.status}`)} ${COLOR.gray(`${event.steps_succeeded} ok, ${event.steps_failed} failed (${fmtMs(event.duration_ms)})`)}`;
    }
  }
}

/** Progress lines per event; `events` adds the raw JSON of each event. */
export function createConsoleSink(opts: ConsoleSinkOptions = {}, out: (line: string) => void = console.log): EventSink {
  const steps = opts.steps ?? true;
  const events = opts.events ?? false;
  return {
    emit(event) {
      if (steps) out(formatEvent(event));
      if (events) out(COLOR.gray(JSON.stringify(event)));
    }
  };
}
