import { setTimeout as sleep } from "node:timers/promises";

export const READY_MESSAGE = "MCP Browser connected";

export type StreamEvent =
  | { event: "ready"; message: string }
  | { event: "heartbeat"; timestamp: number };

export type EventStreamOptions = {
  intervalMs: number;
  signal: AbortSignal;
  /** Milliseconds since the epoch. */
  now?: () => number;
};

/**
 * Yields a `ready` event, then a `heartbeat` every `intervalMs` until
 * `signal` aborts. Each call starts a fresh sequence.
 */
export async function* eventStream(
  options: EventStreamOptions,
): AsyncGenerator<StreamEvent, void, undefined> {
  const { intervalMs, signal } = options;
  const now = options.now ?? Date.now;
  if (signal.aborted) return;

  yield { event: "ready", message: READY_MESSAGE };
  while (!signal.aborted) {
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }
    yield { event: "heartbeat", timestamp: now() / 1000 };
  }
}

export function formatSseEvent(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}
