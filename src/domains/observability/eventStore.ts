import { EventEmitter } from "node:events";
import { appendJsonl } from "../../shared/fileStore";
import { EVENT_RING_SIZE } from "../../shared/constants";
import { createLogger } from "../../shared/log";

const log = createLogger("events");

export type HarnessEventType =
  | "session_starting"
  | "session_ready"
  | "session_failed"
  | "session_disconnected"
  | "session_released"
  | "task_created"
  | "task_setup_started"
  | "task_in_progress"
  | "task_failed"
  | "task_evaluated"
  | "task_done"
  | "task_cancelled"
  | "tool_called"
  | "tool_failed";

export interface HarnessEvent {
  ts: string;
  type: HarnessEventType;
  taskId: string | null;
  scenario: string | null;
  payload: Record<string, unknown>;
}

export class EventStore {
  private readonly emitter = new EventEmitter();
  private readonly recentEvents: HarnessEvent[] = [];
  private persistChain: Promise<void> = Promise.resolve();

  /** @param filePath JSONL sink; null keeps events in memory only. */
  constructor(private readonly filePath: string | null = null) {}

  /**
   * Listeners and the ring see the event immediately. Writes to the sink are
   * serialized in append order; a failed write is logged and later writes continue.
   */
  append(event: HarnessEvent): void {
    this.recentEvents.push(event);
    if (this.recentEvents.length > EVENT_RING_SIZE) {
      this.recentEvents.shift();
    }
    this.emitter.emit("event", event);

    const filePath = this.filePath;
    if (filePath === null) {
      return;
    }
    this.persistChain = this.persistChain
      .then(() => appendJsonl(filePath, event))
      .catch((error) => {
        log.error(`failed to persist ${event.type} event`, error);
      });
  }

  record(type: HarnessEventType, fields: { taskId?: string | null; scenario?: string | null; payload?: Record<string, unknown> } = {}): void {
    this.append({
      ts: new Date().toISOString(),
      type,
      taskId: fields.taskId ?? null,
      scenario: fields.scenario ?? null,
      payload: fields.payload ?? {}
    });
  }

  /** Resolves once every event appended so far has been written or its failure logged. */
  flush(): Promise<void> {
    return this.persistChain;
  }

  onEvent(listener: (event: HarnessEvent) => void): () => void {
    this.emitter.on("event", listener);
    return () => {
      this.emitter.off("event", listener);
    };
  }

  listRecent(limit = 200): HarnessEvent[] {
    return this.recentEvents.slice(-Math.max(1, limit));
  }

  listFailures(limit = 200): HarnessEvent[] {
    return this.recentEvents.filter((event) => failureCode(event) !== null).slice(-Math.max(1, limit));
  }

  failureHeatmap(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const event of this.recentEvents) {
      const code = failureCode(event);
      if (code === null) {
        continue;
      }
      counts[code] = (counts[code] ?? 0) + 1;
    }
    return counts;
  }

  failureTrend(): Array<{ day: string; count: number }> {
    const perDay: Record<string, number> = {};
    for (const event of this.recentEvents) {
      if (failureCode(event) === null) {
        continue;
      }
      const day = event.ts.slice(0, 10);
      perDay[day] = (perDay[day] ?? 0) + 1;
    }
    return Object.entries(perDay)
      .map(([day, count]) => ({ day, count }))
      .sort((a, b) => a.day.localeCompare(b.day));
  }
}

function failureCode(event: HarnessEvent): string | null {
  const code = event.payload.reasonCode;
  if (typeof code !== "string" || code === "OK") {
    return null;
  }
  return event.type === "tool_failed" || event.type === "task_failed" || event.type === "session_failed" || event.type === "task_evaluated"
    ? code
    : null;
}
