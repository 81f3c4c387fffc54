import { FusionStateError } from "../errors";
import type { GraphIR } from "../graph/graph-ir";
import { createLogger, type Logger } from "../logging";
import type { FusionPolicy, RuleFlags } from "../policy/fusion-policy";
import { type BasicBlock, FusionAwareGraph } from "./fusion-aware-graph";
import { opTypeMatcher, SubgraphMatcher } from "./subgraph-matcher";

/** A template occurrence collapsed into one node by pre-fusion. */
export type PrefusedUnit = {
  unit: string;
  nodeId: string;
  /** Original node ids now inside `nodeId`. */
  members: string[];
};

export type KernelSplitterOptions = {
  logger?: Logger;
};

/**
 * Partitions a graph into kernels: template pre-fusion, then pairwise
 * rule-checked fusion along consumer edges.
 */
export class KernelSplitter {
  private readonly logger: Logger;

  constructor(
    readonly policy: FusionPolicy,
    options: KernelSplitterOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("kernel-splitter");
  }

  /**
   * Collapse every occurrence of every policy template into a node typed
   * with the template name. Mutates `graph`.
   */
  preprocess(graph: GraphIR): PrefusedUnit[] {
    const matcher = new SubgraphMatcher(graph, opTypeMatcher);
    // Collapsing convex sets keeps the relative order of the remaining
    // original nodes valid, so one order serves every collapse.
    const rank = new Map(
      graph.topologicalOrder().map((node, position) => [node.id, position]),
    );
    const prefused: PrefusedUnit[] = [];
    for (const unit of this.policy.units) {
      const matches = matcher.findAll(unit);
      let collapsed = 0;
      for (const match of matches) {
        const ids = Object.values(match);
        // An earlier collapse of this batch can join two paths around this
        // occurrence; matching already checked it against the graph before.
        if (collapsed > 0 && !graph.isConvex(ids)) {
          this.logger.debug(
            `skipping ${unit.name} at ${ids.join(", ")}: no longer convex`,
          );
          matcher.release(ids);
          continue;
        }
        const node = graph.fuse(ids, unit.name, rank);
        collapsed++;
        matcher.consume([node.id]);
        prefused.push({ unit: unit.name, nodeId: node.id, members: node.members.slice() });
      }
      if (collapsed > 0) {
        this.logger.info(`${unit.name}: ${collapsed} occurrence(s)`);
      }
    }
    return prefused;
  }

  /** Main fusion loop over an already pre-fused graph. */
  partition(graph: GraphIR): BasicBlock[] {
    const flags = this.policy.flags;
    const fag = new FusionAwareGraph(graph);
    let fusions = 0;
    for (let i = 0; i < fag.size; i++) {
      if (fag.isFused(i)) continue;
      fag.markReady(i);
      // Re-examine the grown block until nothing more joins it.
      while (this.fuseForward(fag, i, flags)) {
        fusions++;
      }
    }
    const blocks = fag.basicBlocks();
    this.logger.debug(
      `${fag.size} node(s), ${fusions} fusion round(s), ${blocks.length} block(s)`,
    );
    return blocks;
  }

  split(graph: GraphIR): BasicBlock[] {
    this.preprocess(graph);
    return this.partition(graph);
  }

  private fuseForward(fag: FusionAwareGraph, i: number, flags: RuleFlags): boolean {
    const outbounds = fag.outbounds(i);
    if (outbounds.length === 0) {
      return false;
    }
    if (flags.multiOutput === "forbid" && outbounds.length > 1) {
      return false;
    }
    const sourceType = fag.typeOf(i);
    let fused = false;
    for (const j of outbounds) {
      if (fag.isFused(j)) continue;
      if (!this.policy.isFusible(sourceType, fag.typeOf(j))) continue;
      if (flags.requireReady && !fag.isReady(j)) continue;
      fag.fuse(i, j, flags.multiOutput !== "forbid");
      fag.markReady(j);
      fused = true;
      if (flags.multiOutput === "first") break;
    }
    return fused;
  }
}

/**
 * Copy of `graph` with every multi-node block collapsed into one node typed
 * with the block label. `blocks` must come from a partition of `graph`.
 */
export function collapseBlocks(graph: GraphIR, blocks: BasicBlock[]): GraphIR {
  const collapsed = graph.clone();
  for (const block of blocks) {
    if (block.nodes.length < 2) continue;
    if (!collapsed.isConvex(block.nodes)) {
      throw new FusionStateError(
        `block ${block.index} (${block.type}) is not convex and cannot be collapsed`,
      );
    }
    collapsed.fuse(block.nodes, block.type);
  }
  return collapsed;
}
