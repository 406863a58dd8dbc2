import type { z } from "zod";

import {
  KnownBlockRecord,
  type BlockRecordEnvelope,
  type InitialModelBlockRecord,
  type PresolveSummaryBlockRecord,
  type ResponseBlockRecord,
  type SearchProgressBlockRecord,
  type SolverBlockRecord,
} from "../contracts/log_blocks";
import { parseDecimal } from "../overview/numeric";
import { MalformedFieldError } from "../overview/overview_errors";
import {
  KNOWN_BLOCK_KINDS,
  type InitialModelBlock,
  type LogBlock,
  type OpaqueBlock,
  type PresolveSummaryBlock,
  type ProgressPoint,
  type ResponseBlock,
  type ResponseFields,
  type SearchProgressBlock,
  type SemanticVersion,
  type SolverBlock,
} from "./block_types";

const VERSION_PATTERN = /(\d+)\.(\d+)\.(\d+)/;

export class RecordSolverBlock implements SolverBlock {
  readonly kind = "solver" as const;
  private readonly parameters: Readonly<Record<string, unknown>>;

  constructor(private readonly record: SolverBlockRecord) {
    this.parameters = Object.freeze({ ...(record.parameters ?? {}) });
  }

  getVersion(): string {
    return this.record.version;
  }

  getParsedVersion(): SemanticVersion {
    const match = VERSION_PATTERN.exec(this.record.version);
    if (!match) {
      throw new MalformedFieldError("version", `No major.minor.patch in "${this.record.version}"`);
    }
    return {
      major: Number(match[1]),
      minor: Number(match[2]),
      patch: Number(match[3]),
    };
  }

  getNumberOfWorkers(): number | null {
    return this.record.numWorkers ?? null;
  }

  getParameters(): Readonly<Record<string, unknown>> {
    return this.parameters;
  }
}

export class RecordInitialModelBlock implements InitialModelBlock {
  readonly kind = "initial_model" as const;

  constructor(private readonly record: InitialModelBlockRecord) {}

  getNumVariables(): number {
    return this.record.numVariables;
  }

  getNumConstraints(): number {
    return this.record.numConstraints;
  }

  isOptimization(): boolean {
    return this.record.isOptimization;
  }
}

export class RecordSearchProgressBlock implements SearchProgressBlock {
  readonly kind = "search_progress" as const;
  private readonly series: readonly ProgressPoint[];

  constructor(private readonly record: SearchProgressBlockRecord) {
    // Events with neither objective nor bound (e.g. bare "#Done" lines) carry nothing to plot.
    this.series = Object.freeze(
      (record.events ?? [])
        .map((event) => ({
          time: event.time,
          objective: event.objective ?? null,
          bound: event.bound ?? null,
        }))
        .filter((point) => point.objective !== null || point.bound !== null)
        .sort((a, b) => a.time - b.time)
    );
  }

  getPresolveTime(): number {
    return this.record.presolveTime;
  }

  getProgressSeries(): readonly ProgressPoint[] {
    return this.series;
  }
}

export class RecordResponseBlock implements ResponseBlock {
  readonly kind = "response" as const;
  private readonly fields: ResponseFields;

  constructor(private readonly record: ResponseBlockRecord) {
    this.fields = Object.freeze({ ...record.fields });
  }

  toRecord(): ResponseFields {
    return this.fields;
  }

  getGap(): number | null {
    if (this.record.gap !== undefined) {
      return this.record.gap;
    }
    if (!("objective" in this.fields) || !("best_bound" in this.fields)) {
      return null;
    }
    const objective = parseDecimal(this.fields.objective);
    const bound = parseDecimal(this.fields.best_bound);
    if (objective.state !== "known" || bound.state !== "known") {
      return null;
    }
    return (100 * Math.abs(objective.value - bound.value)) / Math.max(1, Math.abs(objective.value));
  }
}

export class RecordPresolveSummaryBlock implements PresolveSummaryBlock {
  readonly kind = "presolve_summary" as const;

  constructor(private readonly record: PresolveSummaryBlockRecord) {}

  isSolvedByPresolve(): boolean {
    return this.record.solvedByPresolve;
  }
}

function toBlock(record: KnownBlockRecord): LogBlock {
  switch (record.kind) {
    case "solver":
      return new RecordSolverBlock(record);
    case "initial_model":
      return new RecordInitialModelBlock(record);
    case "search_progress":
      return new RecordSearchProgressBlock(record);
    case "response":
      return new RecordResponseBlock(record);
    case "presolve_summary":
      return new RecordPresolveSummaryBlock(record);
  }
}

export type HydrateResult =
  | { ok: true; blocks: LogBlock[]; opaqueCount: number }
  | { ok: false; index: number; kind: string; error: z.ZodError };

/**
 * Turn wire records into block objects, preserving order.
 * Stops at the first record of a known kind that fails its schema.
 */
export function hydrateBlocks(records: readonly BlockRecordEnvelope[]): HydrateResult {
  const blocks: LogBlock[] = [];
  let opaqueCount = 0;

  for (const [index, record] of records.entries()) {
    if (!KNOWN_BLOCK_KINDS.some((kind) => kind === record.kind)) {
      const opaque: OpaqueBlock = { kind: record.kind };
      blocks.push(opaque);
      opaqueCount++;
      continue;
    }

    const parsed = KnownBlockRecord.safeParse(record);
    if (!parsed.success) {
      return { ok: false, index, kind: record.kind, error: parsed.error };
    }
    blocks.push(toBlock(parsed.data));
  }

  return { ok: true, blocks, opaqueCount };
}
