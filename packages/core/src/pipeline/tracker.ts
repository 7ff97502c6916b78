// ============================================
// Pipeline Tracker
// ============================================

export type StageRecordStatus = "running" | "success" | "partial" | "failure";

export interface StageRecord {
  readonly name: string;
  status: StageRecordStatus;
  readonly startedAt: number;
  durationMs?: number;
  reason?: string;
}

export interface PipelineSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly partial: number;
  readonly failed: number;
  readonly totalDurationMs: number;
  readonly stages: ReadonlyArray<{
    readonly name: string;
    readonly status: StageRecordStatus;
    readonly durationMs: number;
    readonly reason?: string;
  }>;
}

/**
 * Stage timings for one chapter run.
 *
 * @example
 * ```typescript
 * const record = tracker.start("PLANNING");
 * // ...
 * tracker.complete(record, "success");
 * tracker.summary().stages[0]; // { name: "PLANNING", status: "success", durationMs: 12.4 }
 * ```
 */
export class PipelineTracker {
  private readonly records: StageRecord[] = [];

  constructor(private readonly now: () => number = () => performance.now()) {}

  start(name: string): StageRecord {
    const record: StageRecord = { name, status: "running", startedAt: this.now() };
    this.records.push(record);
    return record;
  }

  complete(record: StageRecord, status: Exclude<StageRecordStatus, "running"> = "success"): void {
    record.status = status;
    record.durationMs = this.now() - record.startedAt;
  }

  fail(record: StageRecord, reason: string): void {
    this.complete(record, "failure");
    record.reason = reason;
  }

  summary(): PipelineSummary {
    const stages = this.records.map((record) => ({
      name: record.name,
      status: record.status,
      durationMs: record.durationMs ?? this.now() - record.startedAt,
      ...(record.reason !== undefined && { reason: record.reason }),
    }));

    return {
      total: stages.length,
      succeeded: stages.filter((s) => s.status === "success").length,
      partial: stages.filter((s) => s.status === "partial").length,
      failed: stages.filter((s) => s.status === "failure").length,
      totalDurationMs: stages.reduce((sum, s) => sum + s.durationMs, 0),
      stages,
    };
  }
}
