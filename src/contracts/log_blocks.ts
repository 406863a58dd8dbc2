import { z } from "zod";

/**
 * Wire format for parsed log blocks.
 *
 * The upstream parser serializes one record per block. Known kinds are
 * validated strictly; anything else passes through as an opaque block.
 */

export const BlockRecordEnvelope = z
  .object({
    kind: z.string().min(1),
  })
  .passthrough();

export type BlockRecordEnvelope = z.infer<typeof BlockRecordEnvelope>;

export const SolverBlockRecord = z.object({
  kind: z.literal("solver"),
  version: z.string().min(1),
  numWorkers: z.number().int().min(1).nullable().optional(),
  parameters: z.record(z.string(), z.unknown()).optional(),
});

export type SolverBlockRecord = z.infer<typeof SolverBlockRecord>;

export const InitialModelBlockRecord = z.object({
  kind: z.literal("initial_model"),
  numVariables: z.number().int().min(0),
  numConstraints: z.number().int().min(0),
  isOptimization: z.boolean(),
});

export type InitialModelBlockRecord = z.infer<typeof InitialModelBlockRecord>;

export const ProgressEventRecord = z.object({
  time: z.number().min(0),
  objective: z.number().nullable().optional(),
  bound: z.number().nullable().optional(),
});

export type ProgressEventRecord = z.infer<typeof ProgressEventRecord>;

export const SearchProgressBlockRecord = z.object({
  kind: z.literal("search_progress"),
  presolveTime: z.number().min(0),
  events: z.array(ProgressEventRecord).optional(),
});

export type SearchProgressBlockRecord = z.infer<typeof SearchProgressBlockRecord>;

export const ResponseBlockRecord = z.object({
  kind: z.literal("response"),
  // Raw key/value lines of the response section. Numeric values may arrive as text ("inf").
  fields: z.record(z.string(), z.union([z.string(), z.number()])),
  // Gap as reported by the solver, if the parser extracted one.
  gap: z.number().nullable().optional(),
});

export type ResponseBlockRecord = z.infer<typeof ResponseBlockRecord>;

export const PresolveSummaryBlockRecord = z.object({
  kind: z.literal("presolve_summary"),
  solvedByPresolve: z.boolean(),
});

export type PresolveSummaryBlockRecord = z.infer<typeof PresolveSummaryBlockRecord>;

export const KnownBlockRecord = z.discriminatedUnion("kind", [
  SolverBlockRecord,
  InitialModelBlockRecord,
  SearchProgressBlockRecord,
  ResponseBlockRecord,
  PresolveSummaryBlockRecord,
]);

export type KnownBlockRecord = z.infer<typeof KnownBlockRecord>;

export const OverviewRequest = z.object({
  blocks: z.array(BlockRecordEnvelope).max(500),
  comments: z.array(z.string()).max(100).optional(),
});

export type OverviewRequest = z.infer<typeof OverviewRequest>;
