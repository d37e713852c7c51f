import fs from "fs/promises";
import path from "path";
import type { MacroAction, MatchAttempt } from "@uimacro/shared";

export interface StepTrace {
  run_id: string;
  step_index: number;
  action: MacroAction;
  started_at: string;
  ended_at: string;
  ok: boolean;
  degraded: boolean;
  match_attempts: MatchAttempt[];
  error?: string;
  error_code?: string;
}

export interface TraceWriter {
  write(trace: StepTrace): Promise<void>;
}

export function createRunId(date = new Date()): string {
  return `run-${date.toISOString().replace(/[:.]/g, "-")}`;
}

/** Appends one JSON line per step to `<baseDir>/<runId>/step_traces.jsonl`. */
export class FileTraceWriter implements TraceWriter {
  readonly tracePath: string;
  private ready: Promise<string | undefined> | null = null;

  constructor(baseDir: string, runId: string) {
    this.tracePath = path.resolve(baseDir, runId, "step_traces.jsonl");
  }

  async write(trace: StepTrace): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(path.dirname(this.tracePath), { recursive: true });
    }
    await this.ready;
    await fs.appendFile(this.tracePath, `${JSON.stringify(trace)}\n`, "utf-8");
  }
}

export class MemoryTraceWriter implements TraceWriter {
  traces: StepTrace[] = [];

  async write(trace: StepTrace): Promise<void> {
    this.traces.push(trace);
  }
}
