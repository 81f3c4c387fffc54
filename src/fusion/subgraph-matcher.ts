import type { GraphIR } from "../graph/graph-ir";
import type { GraphNode } from "../graph/types";
import type { FusionUnit } from "../policy/fusion-policy";

/** Decides whether a node of `nodeType` may stand in for an alias. */
export type TypeMatcher = (nodeType: string, accepted: readonly string[]) => boolean;

export const opTypeMatcher: TypeMatcher = (nodeType, accepted) =>
  accepted.includes(nodeType);

/** One occurrence of a template: alias -> node id. */
export type SubgraphMatch = Record<string, string>;

type SearchStep = {
  alias: string;
  /** Already-placed alias whose neighbours supply the candidates. */
  via?: { alias: string; direction: "inbound" | "outbound" };
};

/**
 * Order aliases so that every alias after the first touches an earlier one,
 * starting from the alias with the most template edges. Aliases with no
 * edge to the placed set start a new component and draw candidates from the
 * whole graph.
 */
function planSearch(unit: FusionUnit): SearchStep[] {
  const aliases = Object.keys(unit.nodes);
  const degree = new Map<string, number>(aliases.map((alias) => [alias, 0]));
  for (const [from, to] of unit.edges) {
    degree.set(from, (degree.get(from) ?? 0) + 1);
    degree.set(to, (degree.get(to) ?? 0) + 1);
  }

  const placed = new Set<string>();
  const steps: SearchStep[] = [];
  while (steps.length < aliases.length) {
    let next: SearchStep | undefined;
    for (const [from, to] of unit.edges) {
      if (placed.has(from) && !placed.has(to)) {
        next = { alias: to, via: { alias: from, direction: "outbound" } };
        break;
      }
      if (placed.has(to) && !placed.has(from)) {
        next = { alias: from, via: { alias: to, direction: "inbound" } };
        break;
      }
    }
    if (!next) {
      let best: string | undefined;
      for (const alias of aliases) {
        if (placed.has(alias)) continue;
        if (best === undefined || (degree.get(alias) ?? 0) > (degree.get(best) ?? 0)) {
          best = alias;
        }
      }
      if (best === undefined) break;
      next = { alias: best };
    }
    placed.add(next.alias);
    steps.push(next);
  }
  return steps;
}

/**
 * Finds non-overlapping template occurrences. Nodes used by any occurrence
 * are marked consumed and excluded from every later search on this matcher.
 */
export class SubgraphMatcher {
  private readonly consumed = new Set<string>();

  constructor(
    private readonly graph: GraphIR,
    private readonly matcher: TypeMatcher = opTypeMatcher,
  ) {}

  isConsumed(id: string): boolean {
    return this.consumed.has(id);
  }

  consume(ids: Iterable<string>): void {
    for (const id of ids) {
      this.consumed.add(id);
    }
  }

  release(ids: Iterable<string>): void {
    for (const id of ids) {
      this.consumed.delete(id);
    }
  }

  findAll(unit: FusionUnit): SubgraphMatch[] {
    const steps = planSearch(unit);
    const matches: SubgraphMatch[] = [];
    if (steps.length === 0) {
      return matches;
    }
    const [first] = steps;
    for (const anchor of this.graph.nodes()) {
      if (!this.accepts(unit, first.alias, anchor)) continue;
      const assignment = new Map<string, string>([[first.alias, anchor.id]]);
      if (this.extend(unit, steps, 1, assignment)) {
        const match: SubgraphMatch = Object.fromEntries(assignment);
        this.consume(assignment.values());
        matches.push(match);
      }
    }
    return matches;
  }

  private accepts(unit: FusionUnit, alias: string, node: GraphNode): boolean {
    return (
      !this.consumed.has(node.id) && this.matcher(node.type, unit.nodes[alias])
    );
  }

  private candidates(step: SearchStep, assignment: Map<string, string>): GraphNode[] {
    if (!step.via) {
      return this.graph.nodes();
    }
    const placedId = assignment.get(step.via.alias);
    if (placedId === undefined) {
      return [];
    }
    const placed = this.graph.require(placedId);
    return step.via.direction === "outbound"
      ? this.graph.outboundNodes(placed)
      : this.graph.inboundNodes(placed);
  }

  /** Every template edge between `alias` and an already-placed alias exists. */
  private edgesHold(
    unit: FusionUnit,
    alias: string,
    nodeId: string,
    assignment: Map<string, string>,
  ): boolean {
    for (const [from, to] of unit.edges) {
      if (from !== alias && to !== alias) continue;
      const fromId = from === alias ? nodeId : assignment.get(from);
      const toId = to === alias ? nodeId : assignment.get(to);
      if (fromId === undefined || toId === undefined) continue;
      if (!this.graph.require(fromId).outbounds.includes(toId)) {
        return false;
      }
    }
    return true;
  }

  private extend(
    unit: FusionUnit,
    steps: SearchStep[],
    depth: number,
    assignment: Map<string, string>,
  ): boolean {
    if (depth === steps.length) {
      return this.graph.isConvex(assignment.values());
    }
    const step = steps[depth];
    const used = new Set(assignment.values());
    for (const candidate of this.candidates(step, assignment)) {
      if (used.has(candidate.id)) continue;
      if (!this.accepts(unit, step.alias, candidate)) continue;
      if (!this.edgesHold(unit, step.alias, candidate.id, assignment)) continue;
      assignment.set(step.alias, candidate.id);
      if (this.extend(unit, steps, depth + 1, assignment)) {
        return true;
      }
      assignment.delete(step.alias);
    }
    return false;
  }
}
