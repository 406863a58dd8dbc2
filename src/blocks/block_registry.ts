import type { DuplicatePolicy } from "../config/overview_config";
import { silentLogger, type OverviewLogger } from "../logger";
import { DuplicateBlockError } from "../overview/overview_errors";
import {
  isKnownBlock,
  KNOWN_BLOCK_KINDS,
  type BlockByKind,
  type KnownBlockKind,
  type LogBlock,
} from "./block_types";

export type Option<T> = { present: true; block: T } | { present: false };

export const ABSENT: Option<never> = { present: false };

type Buckets = { [K in KnownBlockKind]: BlockByKind[K][] };

export type BlockRegistryOptions = {
  duplicatePolicy?: DuplicatePolicy;
  log?: OverviewLogger;
};

/**
 * Zero-or-one lookup per block kind over the flat block list of one log.
 *
 * A kind expected to be unique can still show up twice when a log was pasted
 * twice or cut mid-section; the duplicate policy decides which one wins.
 */
export class BlockRegistry {
  private readonly buckets: Buckets = {
    solver: [],
    initial_model: [],
    search_progress: [],
    response: [],
    presolve_summary: [],
  };
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly log: OverviewLogger;

  constructor(blocks: readonly LogBlock[], opts: BlockRegistryOptions = {}) {
    this.duplicatePolicy = opts.duplicatePolicy ?? "first";
    this.log = opts.log ?? silentLogger;

    for (const block of blocks) {
      if (!isKnownBlock(block)) continue;
      switch (block.kind) {
        case "solver":
          this.buckets.solver.push(block);
          break;
        case "initial_model":
          this.buckets.initial_model.push(block);
          break;
        case "search_progress":
          this.buckets.search_progress.push(block);
          break;
        case "response":
          this.buckets.response.push(block);
          break;
        case "presolve_summary":
          this.buckets.presolve_summary.push(block);
          break;
      }
    }
  }

  lookup<K extends KnownBlockKind>(kind: K): Option<BlockByKind[K]> {
    const bucket: BlockByKind[K][] = this.buckets[kind];
    if (bucket.length === 0) {
      return ABSENT;
    }

    if (bucket.length > 1) {
      if (this.duplicatePolicy === "error") {
        throw new DuplicateBlockError({
          code: "duplicate_block",
          message: `Found ${bucket.length} "${kind}" blocks; expected at most one`,
          blockKind: kind,
          count: bucket.length,
        });
      }
      this.log.warn(
        { blockKind: kind, count: bucket.length, policy: this.duplicatePolicy },
        "overview.duplicate_block"
      );
    }

    const block = this.duplicatePolicy === "last" ? bucket[bucket.length - 1] : bucket[0];
    return { present: true, block };
  }

  /** Kinds with more than one instance, in registry order. */
  duplicateKinds(): KnownBlockKind[] {
    return KNOWN_BLOCK_KINDS.filter((kind) => this.buckets[kind].length > 1);
  }
}
