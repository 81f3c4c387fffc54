import { PolicyConfigError } from "../errors";

/**
 * How a node with several consumers may fuse forward:
 * - forbid: not at all
 * - first: into its first fusible consumer only
 * - all: into every fusible consumer
 */
export type MultiOutputMode = "forbid" | "first" | "all";

export type RuleFlags = Readonly<{
  multiOutput: MultiOutputMode;
  /** Only absorb consumers that have already been visited as a fusion source. */
  requireReady: boolean;
}>;

export const DEFAULT_RULE_FLAGS: RuleFlags = Object.freeze({
  multiOutput: "first",
  requireReady: false,
});

/**
 * Named micro-graph pre-fused before pairwise fusion: each alias accepts a
 * set of op types, each edge is a required producer -> consumer link.
 */
export type FusionUnit = Readonly<{
  name: string;
  nodes: Readonly<Record<string, readonly string[]>>;
  edges: ReadonlyArray<readonly [string, string]>;
}>;

export type FusibilityEntry = readonly [producer: string, consumer: string, fusible: boolean];

/**
 * Order-sensitive (producer, consumer) fusibility lookup. Unlisted pairs are
 * not fusible.
 */
export class FusibilityTable {
  private readonly pairs = new Map<string, Map<string, boolean>>();

  constructor(entries: Iterable<FusibilityEntry> = []) {
    for (const [producer, consumer, fusible] of entries) {
      let row = this.pairs.get(producer);
      if (!row) {
        row = new Map();
        this.pairs.set(producer, row);
      }
      row.set(consumer, fusible);
    }
  }

  static fromNested(table: Record<string, Record<string, boolean>>): FusibilityTable {
    const entries: FusibilityEntry[] = [];
    for (const [producer, row] of Object.entries(table)) {
      for (const [consumer, fusible] of Object.entries(row)) {
        entries.push([producer, consumer, fusible]);
      }
    }
    return new FusibilityTable(entries);
  }

  isFusible(producer: string, consumer: string): boolean {
    return this.pairs.get(producer)?.get(consumer) ?? false;
  }

  get size(): number {
    let count = 0;
    for (const row of this.pairs.values()) {
      count += row.size;
    }
    return count;
  }

  entries(): FusibilityEntry[] {
    const out: FusibilityEntry[] = [];
    for (const [producer, row] of this.pairs) {
      for (const [consumer, fusible] of row) {
        out.push([producer, consumer, fusible]);
      }
    }
    return out;
  }
}

function validateUnit(unit: FusionUnit): void {
  const aliases = Object.keys(unit.nodes);
  if (aliases.length === 0) {
    throw new PolicyConfigError(`fusion unit ${unit.name} has no nodes`);
  }
  for (const alias of aliases) {
    if (unit.nodes[alias].length === 0) {
      throw new PolicyConfigError(
        `fusion unit ${unit.name} alias ${alias} accepts no op types`,
      );
    }
  }
  for (const [from, to] of unit.edges) {
    for (const alias of [from, to]) {
      if (!Object.prototype.hasOwnProperty.call(unit.nodes, alias)) {
        throw new PolicyConfigError(
          `fusion unit ${unit.name} edge ${from} -> ${to} names undefined alias ${alias}`,
        );
      }
    }
    if (from === to) {
      throw new PolicyConfigError(
        `fusion unit ${unit.name} has a self edge on ${from}`,
      );
    }
  }
}

function freezeUnit(unit: FusionUnit): FusionUnit {
  const nodes: Record<string, readonly string[]> = {};
  for (const [alias, types] of Object.entries(unit.nodes)) {
    nodes[alias] = Object.freeze(types.slice());
  }
  return Object.freeze({
    name: unit.name,
    nodes: Object.freeze(nodes),
    edges: Object.freeze(
      unit.edges.map(([from, to]) => Object.freeze([from, to] as const)),
    ),
  });
}

export type FusionPolicyInit = {
  units?: FusionUnit[];
  table?: FusibilityTable;
  flags?: Partial<RuleFlags>;
};

/**
 * Read-only fusion configuration: templates for pre-fusion, the pairwise
 * table and the rule flags. Safe to share across concurrent split runs.
 */
export class FusionPolicy {
  readonly units: readonly FusionUnit[];
  readonly table: FusibilityTable;
  readonly flags: RuleFlags;

  constructor(init: FusionPolicyInit = {}) {
    const units = init.units ?? [];
    const names = new Set<string>();
    for (const unit of units) {
      if (names.has(unit.name)) {
        throw new PolicyConfigError(`duplicate fusion unit ${unit.name}`);
      }
      names.add(unit.name);
      validateUnit(unit);
    }
    this.units = Object.freeze(units.map(freezeUnit));
    this.table = init.table ?? new FusibilityTable();
    this.flags = Object.freeze({ ...DEFAULT_RULE_FLAGS, ...init.flags });
  }

  isFusible(producer: string, consumer: string): boolean {
    return this.table.isFusible(producer, consumer);
  }

  withFlags(flags: Partial<RuleFlags>): FusionPolicy {
    return new FusionPolicy({
      units: this.units.slice(),
      table: this.table,
      flags: { ...this.flags, ...flags },
    });
  }
}
