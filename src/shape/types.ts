import type { GraphIR } from "../graph/graph-ir";
import type { GraphNode, NodeAttrs, Shape } from "../graph/types";

export type ShapeResult = {
  inputShape: Shape[];
  outputShape: Shape[];
  /** Derived attributes written back onto the node (kernel shape, pads, ...). */
  attrs?: NodeAttrs;
};

export type DiagnosticKind =
  | "unsupported_op"
  | "malformed_topology"
  | "invalid_attribute"
  | "shape_mismatch";

export type ShapeDiagnostic = {
  nodeId: string;
  opType: string;
  kind: DiagnosticKind;
  message: string;
};

export interface RuleContext {
  readonly patchMaxHops: number;
  report(kind: DiagnosticKind, message: string): void;
}

/**
 * Returns the node's shapes, or undefined when they cannot be derived (after
 * reporting why through the context).
 */
export type ShapeRule = (
  graph: GraphIR,
  node: GraphNode,
  ctx: RuleContext,
) => ShapeResult | undefined;
