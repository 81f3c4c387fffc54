import { readConfig } from "../config";
import type { GraphIR } from "../graph/graph-ir";
import type { GraphNode } from "../graph/types";
import { createLogger, type Logger } from "../logging";
import { DEFERRED_KINDS, resolveOpKind } from "./op-kinds";
import { SHAPE_RULES } from "./rules";
import type { DiagnosticKind, RuleContext, ShapeDiagnostic, ShapeResult } from "./types";

export type ShapeInferenceOptions = {
  /** Roots of the traversal; defaults to every node without producers. */
  heads?: string[];
  patchMaxHops?: number;
  logger?: Logger;
};

export type ShapeInferenceReport = {
  /** Traversal order used by both passes. */
  order: string[];
  diagnostics: ShapeDiagnostic[];
  /** Nodes re-shaped by the patch pass. */
  patched: string[];
  /** Reachable nodes still without an output shape. */
  unresolved: string[];
};

function applyResult(node: GraphNode, result: ShapeResult): void {
  node.inputShape = result.inputShape.map((shape) => shape.slice());
  node.outputShape = result.outputShape.map((shape) => shape.slice());
  if (result.attrs) {
    node.attrs = { ...node.attrs, ...result.attrs };
  }
}

/**
 * Annotate every node reachable from the heads with input / output shapes.
 *
 * Pass 1 walks the topological order and applies the rule of each node's
 * kind. Pass 2 revisits pack and strided-slice nodes, whose shapes come from
 * a reshape further down that pass 1 has annotated by then. Per-node
 * failures are collected as diagnostics and never abort the walk.
 */
export function inferShapes(
  graph: GraphIR,
  options: ShapeInferenceOptions = {},
): ShapeInferenceReport {
  const logger = options.logger ?? createLogger("shape-inference");
  const patchMaxHops = options.patchMaxHops ?? readConfig().patchMaxHops;
  const order = graph.topologicalOrder(options.heads ?? graph.heads());
  const diagnostics: ShapeDiagnostic[] = [];

  const contextFor = (node: GraphNode): RuleContext => ({
    patchMaxHops,
    report(kind: DiagnosticKind, message: string) {
      diagnostics.push({ nodeId: node.id, opType: node.type, kind, message });
      logger.warn(`${kind} at ${node.id} (${node.type}): ${message}`);
    },
  });

  for (const node of order) {
    const kind = resolveOpKind(node.type);
    if (!kind) {
      contextFor(node).report("unsupported_op", `${node.type} is not supported`);
      continue;
    }
    const result = SHAPE_RULES[kind](graph, node, contextFor(node));
    if (result) {
      applyResult(node, result);
      logger.debug(
        `${node.id}: [${result.inputShape.map((s) => `[${s}]`)}] -> [${result.outputShape.map((s) => `[${s}]`)}]`,
      );
    }
  }

  const patched: string[] = [];
  for (const node of order) {
    const kind = resolveOpKind(node.type);
    if (!kind || !DEFERRED_KINDS.has(kind)) continue;
    const result = SHAPE_RULES[kind](graph, node, contextFor(node));
    if (result) {
      applyResult(node, result);
      patched.push(node.id);
    }
  }

  const unresolved = order
    .filter((node) => !node.outputShape || node.outputShape.length === 0)
    .map((node) => node.id);
  if (unresolved.length > 0) {
    logger.info(`${unresolved.length} node(s) left without shapes`);
  }

  return {
    order: order.map((node) => node.id),
    diagnostics,
    patched,
    unresolved,
  };
}
