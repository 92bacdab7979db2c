/**
 * Evaluation trace events
 *
 * The core never prints. An `onTrace` callback receives these events as they
 * happen; `TraceLog` keeps them in memory for callers that want the whole run.
 */

export interface RunStartedEvent {
  type: "run_started";
  runId: string;
}

export interface RunCompletedEvent {
  type: "run_completed";
  runId: string;
  durationMs: number;
}

export interface RunFailedEvent {
  type: "run_failed";
  runId: string;
  code: string;
  error: string;
  line?: number;
  column?: number;
}

export interface FunctionCalledEvent {
  type: "function_called";
  name: string;
  origin: "closure" | "registry";
  argCount: number;
  line: number;
  column: number;
}

export interface PipeStageEvent {
  type: "pipe_stage";
  stage: number;
  line: number;
  column: number;
}

export type TraceEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | FunctionCalledEvent
  | PipeStageEvent;

/** Trace entry with metadata */
export interface TraceEntry {
  id: string;
  timestamp: number;
  event: TraceEvent;
}

/** Timestamp plus a short random suffix, e.g. `20260101T120000-k3j9x1` */
export function createRunId(now = new Date()): string {
  const timestamp = now
    .toISOString()
    .replace(/[-:]/g, "")
    .replace(/\.\d+Z$/, "");
  const random = Math.random().toString(36).slice(2, 8);
  return `${timestamp}-${random}`;
}

/**
 * In-memory trace collector
 */
export class TraceLog {
  private entries: TraceEntry[] = [];

  emit(event: TraceEvent): void {
    this.entries.push({
      id: `evt_${this.entries.length.toString().padStart(3, "0")}`,
      timestamp: Date.now(),
      event,
    });
  }

  getEntries(): TraceEntry[] {
    return [...this.entries];
  }

  /** Events of one type */
  ofType<T extends TraceEvent["type"]>(type: T): Extract<TraceEvent, { type: T }>[] {
    const result: Extract<TraceEvent, { type: T }>[] = [];
    for (const entry of this.entries) {
      if (isEventOfType(entry.event, type)) result.push(entry.event);
    }
    return result;
  }

  toJSON(): object {
    return {
      events: this.entries.map((e) => ({
        id: e.id,
        timestamp: new Date(e.timestamp).toISOString(),
        event: e.event,
      })),
    };
  }
}

function isEventOfType<T extends TraceEvent["type"]>(
  event: TraceEvent,
  type: T
): event is Extract<TraceEvent, { type: T }> {
  return event.type === type;
}
