import { FusionStateError, UnknownNodeError } from "../errors";
import type { GraphIR } from "../graph/graph-ir";
import type { GraphNode } from "../graph/types";

/** One kernel of the final partition. */
export type BasicBlock = {
  index: number;
  /** Node type for a singleton, member types joined with "-" otherwise. */
  type: string;
  /** Ids of the graph nodes in the block, in topological order. */
  nodes: string[];
  /** Original node ids, with pre-fused nodes expanded to their members. */
  nodeIds: string[];
};

/**
 * Fusion bookkeeping over a graph's topological order. Positions are dense
 * indices `0..size-1`; blocks are union-find sets keyed by their root.
 */
export class FusionAwareGraph {
  private readonly order: GraphNode[];
  private readonly positions = new Map<string, number>();
  private readonly fused: boolean[];
  private readonly ready: boolean[];
  private readonly parent: number[];
  /** Consumers leaving each block, valid at roots. */
  private readonly frontier: number[][];
  /** Type of the op whose output leaves each block, valid at roots. */
  private readonly blockType: string[];

  constructor(graph: GraphIR) {
    this.order = graph.topologicalOrder();
    this.order.forEach((node, position) => this.positions.set(node.id, position));
    const size = this.order.length;
    this.fused = new Array<boolean>(size).fill(false);
    this.ready = new Array<boolean>(size).fill(false);
    this.parent = this.order.map((_, position) => position);
    this.frontier = this.order.map((node) =>
      node.outbounds.map((id) => this.positionOf(id)),
    );
    this.blockType = this.order.map((node) => node.type);
  }

  get size(): number {
    return this.order.length;
  }

  nodeAt(position: number): GraphNode {
    const node = this.order[position];
    if (!node) {
      throw new FusionStateError(`position ${position} out of range`);
    }
    return node;
  }

  positionOf(id: string): number {
    const position = this.positions.get(id);
    if (position === undefined) {
      throw new UnknownNodeError(`fusion view has no node ${id}`);
    }
    return position;
  }

  /** Effective type of the block holding `position`. */
  typeOf(position: number): string {
    return this.blockType[this.blockOf(position)];
  }

  isFused(position: number): boolean {
    this.nodeAt(position);
    return this.fused[position];
  }

  isReady(position: number): boolean {
    this.nodeAt(position);
    return this.ready[position];
  }

  markReady(position: number): void {
    this.nodeAt(position);
    this.ready[position] = true;
  }

  blockOf(position: number): number {
    this.nodeAt(position);
    let root = position;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    let cursor = position;
    while (this.parent[cursor] !== root) {
      const next = this.parent[cursor];
      this.parent[cursor] = root;
      cursor = next;
    }
    return root;
  }

  /** Consumers outside the block holding `position`, in edge order. */
  outbounds(position: number): number[] {
    const root = this.blockOf(position);
    return this.frontier[root].filter((next) => this.blockOf(next) !== root);
  }

  /**
   * Absorb `consumer` into the block of `source`. The block's frontier
   * becomes the consumer's, plus the source block's other consumers when
   * `preserveOutbounds` is set; its effective type becomes the consumer's.
   */
  fuse(source: number, consumer: number, preserveOutbounds = false): void {
    const root = this.blockOf(source);
    const consumerRoot = this.blockOf(consumer);
    if (this.fused[consumer]) {
      throw new FusionStateError(
        `${this.nodeAt(consumer).id} is already fused`,
      );
    }
    if (consumerRoot === root) {
      throw new FusionStateError(
        `${this.nodeAt(consumer).id} is already in the block of ${this.nodeAt(source).id}`,
      );
    }

    const remaining = preserveOutbounds
      ? this.outbounds(root).filter((next) => this.blockOf(next) !== consumerRoot)
      : [];
    const inherited = this.outbounds(consumerRoot);

    this.parent[consumerRoot] = root;
    this.fused[consumer] = true;
    this.blockType[root] = this.blockType[consumerRoot];

    const next: number[] = [];
    for (const position of [...remaining, ...inherited]) {
      if (this.blockOf(position) !== root && !next.includes(position)) {
        next.push(position);
      }
    }
    this.frontier[root] = next;
  }

  basicBlocks(): BasicBlock[] {
    const byRoot = new Map<number, number[]>();
    for (let position = 0; position < this.order.length; position++) {
      const root = this.blockOf(position);
      const members = byRoot.get(root);
      if (members) {
        members.push(position);
      } else {
        byRoot.set(root, [position]);
      }
    }

    return Array.from(byRoot.entries())
      .sort(([a], [b]) => a - b)
      .map(([, positions], index) => {
        const nodes = positions.map((position) => this.order[position]);
        return {
          index,
          type:
            nodes.length === 1
              ? nodes[0].type
              : nodes.map((node) => node.type).join("-"),
          nodes: nodes.map((node) => node.id),
          nodeIds: nodes.flatMap((node) => node.members),
        };
      });
  }
}
