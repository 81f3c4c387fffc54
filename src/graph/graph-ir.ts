import { GraphCycleError, GraphIngestError, UnknownNodeError } from "../errors";
import { parseGraphRecords } from "./records";
import type { GraphNode, GraphRecords, NodeAttrs, Shape } from "./types";

function cloneShapes(shapes: Shape[] | undefined): Shape[] | undefined {
  return shapes ? shapes.map((shape) => shape.slice()) : undefined;
}

function cloneAttrs(attrs: NodeAttrs): NodeAttrs {
  const out: NodeAttrs = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (Array.isArray(value)) {
      out[key] = structuredClone(value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function pushUnique(list: string[], id: string): void {
  if (!list.includes(id)) {
    list.push(id);
  }
}

/**
 * Replace every id in `from` with `to`, keeping the first occurrence's slot
 * and dropping later duplicates.
 */
function replaceIds(list: string[], from: Set<string>, to: string): string[] {
  const out: string[] = [];
  for (const id of list) {
    pushUnique(out, from.has(id) ? to : id);
  }
  return out;
}

/**
 * Operator graph: nodes keyed by id, edges stored as ordered producer and
 * consumer id lists on both endpoints. Shape inference annotates nodes in
 * place and pre-fusion merges them in place.
 */
export class GraphIR {
  private readonly nodesById = new Map<string, GraphNode>();
  private nextIndex = 0;

  /**
   * Build a graph from converter records. Each node keeps its own declared
   * producer and consumer order; edges declared only on the other endpoint
   * are appended after the declared ones. Edges to ids that are not in the
   * mapping are rejected.
   */
  static fromRecords(input: unknown): GraphIR {
    const records = parseGraphRecords(input);
    const graph = new GraphIR();
    for (const [id, record] of Object.entries(records)) {
      const node = graph.addNode(id, record.type, record.attrs ?? {});
      node.inputShape = cloneShapes(record.inputShape);
      node.outputShape = cloneShapes(record.outputShape);
      if (record.members) {
        node.members = record.members.slice();
      }
    }
    for (const [id, record] of Object.entries(records)) {
      const node = graph.require(id);
      for (const producer of record.inbounds) {
        if (!graph.has(producer)) {
          throw new GraphIngestError(
            `node ${id} lists unknown producer ${producer}`,
          );
        }
        pushUnique(node.inbounds, producer);
      }
      for (const consumer of record.outbounds) {
        if (!graph.has(consumer)) {
          throw new GraphIngestError(
            `node ${id} lists unknown consumer ${consumer}`,
          );
        }
        pushUnique(node.outbounds, consumer);
      }
    }
    for (const [id, record] of Object.entries(records)) {
      for (const producer of record.inbounds) {
        pushUnique(graph.require(producer).outbounds, id);
      }
      for (const consumer of record.outbounds) {
        pushUnique(graph.require(consumer).inbounds, id);
      }
    }
    return graph;
  }

  get size(): number {
    return this.nodesById.size;
  }

  addNode(id: string, type: string, attrs: NodeAttrs = {}): GraphNode {
    if (this.nodesById.has(id)) {
      throw new GraphIngestError(`duplicate node id ${id}`);
    }
    const node: GraphNode = {
      index: this.nextIndex++,
      id,
      type,
      attrs: cloneAttrs(attrs),
      inbounds: [],
      outbounds: [],
      members: [id],
    };
    this.nodesById.set(id, node);
    return node;
  }

  /** Add the edge `from -> to` unless it already exists. */
  connect(from: string, to: string): void {
    const producer = this.require(from);
    const consumer = this.require(to);
    pushUnique(producer.outbounds, to);
    pushUnique(consumer.inbounds, from);
  }

  has(id: string): boolean {
    return this.nodesById.has(id);
  }

  get(id: string): GraphNode | undefined {
    return this.nodesById.get(id);
  }

  require(id: string): GraphNode {
    const node = this.nodesById.get(id);
    if (!node) {
      throw new UnknownNodeError(`graph has no node ${id}`);
    }
    return node;
  }

  /** Nodes in arena order. */
  nodes(): GraphNode[] {
    return Array.from(this.nodesById.values());
  }

  ids(): string[] {
    return Array.from(this.nodesById.keys());
  }

  /** Nodes without producers, in arena order. */
  heads(): string[] {
    return this.nodes()
      .filter((node) => node.inbounds.length === 0)
      .map((node) => node.id);
  }

  inboundNodes(node: GraphNode): GraphNode[] {
    return node.inbounds.map((id) => this.require(id));
  }

  outboundNodes(node: GraphNode): GraphNode[] {
    return node.outbounds.map((id) => this.require(id));
  }

  private reachableFrom(heads: string[]): Set<string> {
    const seen = new Set<string>();
    const stack = heads.slice();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      for (const next of this.require(id).outbounds) {
        if (!seen.has(next)) stack.push(next);
      }
    }
    return seen;
  }

  /**
   * Kahn order. Initially-ready nodes are taken in arena order and consumers
   * are released in edge order, so the result is deterministic. With `heads`
   * only nodes reachable from them are ordered.
   */
  topologicalOrder(heads?: string[]): GraphNode[] {
    const scope = heads ? this.reachableFrom(heads) : undefined;
    const inScope = (id: string) => scope === undefined || scope.has(id);

    const pending = new Map<string, number>();
    const queue: GraphNode[] = [];
    for (const node of this.nodesById.values()) {
      if (!inScope(node.id)) continue;
      const degree = node.inbounds.filter(inScope).length;
      pending.set(node.id, degree);
      if (degree === 0) {
        queue.push(node);
      }
    }

    const order: GraphNode[] = [];
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      order.push(node);
      for (const next of node.outbounds) {
        const remaining = pending.get(next);
        if (remaining === undefined) continue;
        pending.set(next, remaining - 1);
        if (remaining - 1 === 0) {
          queue.push(this.require(next));
        }
      }
    }

    if (order.length !== pending.size) {
      const stuck = Array.from(pending.entries())
        .filter(([, degree]) => degree > 0)
        .map(([id]) => id);
      throw new GraphCycleError(
        `graph has a cycle through ${stuck.slice(0, 8).join(", ")}`,
      );
    }
    return order;
  }

  /**
   * Breadth-first walk along consumer edges; returns nodes 1..maxHops edges
   * away from `id`, nearest first.
   */
  downstream(id: string, maxHops: number): GraphNode[] {
    const seen = new Set<string>([id]);
    const out: GraphNode[] = [];
    let frontier = [this.require(id)];
    for (let hop = 1; hop <= maxHops && frontier.length > 0; hop++) {
      const next: GraphNode[] = [];
      for (const node of frontier) {
        for (const consumerId of node.outbounds) {
          if (seen.has(consumerId)) continue;
          seen.add(consumerId);
          const consumer = this.require(consumerId);
          out.push(consumer);
          next.push(consumer);
        }
      }
      frontier = next;
    }
    return out;
  }

  /**
   * A set is convex when no path leaves it and comes back in. Only convex
   * sets can be collapsed into one node without creating a cycle.
   */
  isConvex(ids: Iterable<string>): boolean {
    const members = new Set(ids);
    const stack: string[] = [];
    for (const id of members) {
      for (const next of this.require(id).outbounds) {
        if (!members.has(next)) stack.push(next);
      }
    }
    const seen = new Set<string>();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      for (const next of this.require(id).outbounds) {
        if (members.has(next)) return false;
        stack.push(next);
      }
    }
    return true;
  }

  private freshId(base: string): string {
    if (!this.nodesById.has(base)) {
      return base;
    }
    let suffix = 1;
    while (this.nodesById.has(`${base}#${suffix}`)) {
      suffix++;
    }
    return `${base}#${suffix}`;
  }

  /**
   * Collapse `ids` into one node of type `type`. Edges to nodes outside the
   * set are kept and rewired onto the new node. Members are ordered by
   * `rank` (position in a topological order) when it covers all of them,
   * otherwise by a fresh topological order of the whole graph.
   */
  fuse(
    ids: string[],
    type: string,
    rank?: ReadonlyMap<string, number>,
  ): GraphNode {
    if (ids.length === 0) {
      throw new GraphIngestError("cannot fuse an empty node set");
    }
    const memberSet = new Set(ids);
    if (memberSet.size !== ids.length) {
      throw new GraphIngestError(`duplicate ids in fuse set ${ids.join(", ")}`);
    }
    for (const id of ids) {
      this.require(id);
    }
    const ordered =
      rank && ids.every((id) => rank.has(id))
        ? ids
            .map((id) => this.require(id))
            .sort((a, b) => (rank.get(a.id) ?? 0) - (rank.get(b.id) ?? 0))
        : this.topologicalOrder().filter((node) => memberSet.has(node.id));

    const inbounds: string[] = [];
    const outbounds: string[] = [];
    for (const node of ordered) {
      for (const id of node.inbounds) {
        if (!memberSet.has(id)) pushUnique(inbounds, id);
      }
      for (const id of node.outbounds) {
        if (!memberSet.has(id)) pushUnique(outbounds, id);
      }
    }

    const first = ordered[0];
    const last = ordered[ordered.length - 1];
    const fusedId = this.freshId(ordered.map((node) => node.id).join("+"));
    const fused: GraphNode = {
      index: this.nextIndex++,
      id: fusedId,
      type,
      attrs: { fusedTypes: ordered.map((node) => node.type) },
      inputShape: cloneShapes(first.inputShape),
      outputShape: cloneShapes(last.outputShape),
      inbounds,
      outbounds,
      members: ordered.flatMap((node) => node.members),
    };

    for (const id of inbounds) {
      const producer = this.require(id);
      producer.outbounds = replaceIds(producer.outbounds, memberSet, fusedId);
    }
    for (const id of outbounds) {
      const consumer = this.require(id);
      consumer.inbounds = replaceIds(consumer.inbounds, memberSet, fusedId);
    }
    for (const id of ids) {
      this.nodesById.delete(id);
    }
    this.nodesById.set(fusedId, fused);
    return fused;
  }

  clone(): GraphIR {
    const copy = new GraphIR();
    for (const node of this.nodesById.values()) {
      copy.nodesById.set(node.id, {
        ...node,
        attrs: cloneAttrs(node.attrs),
        inputShape: cloneShapes(node.inputShape),
        outputShape: cloneShapes(node.outputShape),
        inbounds: node.inbounds.slice(),
        outbounds: node.outbounds.slice(),
        members: node.members.slice(),
      });
    }
    copy.nextIndex = this.nextIndex;
    return copy;
  }

  /** Shape-annotated records, in the same form `fromRecords` accepts. */
  toRecords(): GraphRecords {
    const records: GraphRecords = {};
    for (const node of this.nodesById.values()) {
      records[node.id] = {
        type: node.type,
        attrs: cloneAttrs(node.attrs),
        inbounds: node.inbounds.slice(),
        outbounds: node.outbounds.slice(),
        inputShape: cloneShapes(node.inputShape),
        outputShape: cloneShapes(node.outputShape),
        members: node.members.slice(),
      };
    }
    return records;
  }
}
