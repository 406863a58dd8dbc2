/**
 * Log Blocks
 *
 * Accessor contracts for the blocks an upstream log parser extracts from a
 * CP-SAT run log. The report layer only reads through these; it never sees the
 * raw text the blocks came from.
 */

export type SemanticVersion = {
  major: number;
  minor: number;
  patch: number;
};

export type ResponseStatus = "UNKNOWN" | "OPTIMAL" | "FEASIBLE" | "INFEASIBLE" | "MODEL_INVALID";

export const RESPONSE_STATUSES: readonly ResponseStatus[] = [
  "UNKNOWN",
  "OPTIMAL",
  "FEASIBLE",
  "INFEASIBLE",
  "MODEL_INVALID",
];

export type ResponseFields = Readonly<Record<string, string | number>>;

export type ProgressPoint = {
  time: number;
  objective: number | null;
  bound: number | null;
};

export interface SolverBlock {
  readonly kind: "solver";
  getVersion(): string;
  /** Throws MalformedFieldError when the version string has no major.minor.patch. */
  getParsedVersion(): SemanticVersion;
  getNumberOfWorkers(): number | null;
  getParameters(): Readonly<Record<string, unknown>>;
}

export interface InitialModelBlock {
  readonly kind: "initial_model";
  getNumVariables(): number;
  getNumConstraints(): number;
  isOptimization(): boolean;
}

export interface SearchProgressBlock {
  readonly kind: "search_progress";
  getPresolveTime(): number;
  /** Data points in time order; empty when the search logged no progress. */
  getProgressSeries(): readonly ProgressPoint[];
}

export interface ResponseBlock {
  readonly kind: "response";
  toRecord(): ResponseFields;
  /** Relative gap in percent as the solver defines it, null when not computable. */
  getGap(): number | null;
}

export interface PresolveSummaryBlock {
  readonly kind: "presolve_summary";
  isSolvedByPresolve(): boolean;
}

/** Any block the report layer does not read (e.g. per-worker statistics tables). */
export interface OpaqueBlock {
  readonly kind: string;
}

export type BlockByKind = {
  solver: SolverBlock;
  initial_model: InitialModelBlock;
  search_progress: SearchProgressBlock;
  response: ResponseBlock;
  presolve_summary: PresolveSummaryBlock;
};

export type KnownBlockKind = keyof BlockByKind;

export type KnownBlock = BlockByKind[KnownBlockKind];

export type LogBlock = KnownBlock | OpaqueBlock;

export const KNOWN_BLOCK_KINDS: readonly KnownBlockKind[] = [
  "solver",
  "initial_model",
  "search_progress",
  "response",
  "presolve_summary",
];

export function isKnownBlock(block: LogBlock): block is KnownBlock {
  return KNOWN_BLOCK_KINDS.some((kind) => kind === block.kind);
}
