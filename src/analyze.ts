import type { BasicBlock } from "./fusion/fusion-aware-graph";
import { KernelSplitter, type PrefusedUnit } from "./fusion/kernel-splitter";
import { GraphIR } from "./graph/graph-ir";
import { createLogger, type Logger } from "./logging";
import type { FusionPolicy } from "./policy/fusion-policy";
import { loadDefaultPolicy } from "./policy/policy-config";
import { inferShapes, type ShapeInferenceReport } from "./shape/inference";

export type AnalyzeOptions = {
  /** Defaults to the bundled policy. */
  policy?: FusionPolicy;
  heads?: string[];
  patchMaxHops?: number;
  logger?: Logger;
};

export type ModelAnalysis = {
  /** Shape-annotated graph, before pre-fusion. */
  graph: GraphIR;
  /** Copy of `graph` with template occurrences collapsed. */
  prefusedGraph: GraphIR;
  shapes: ShapeInferenceReport;
  prefused: PrefusedUnit[];
  blocks: BasicBlock[];
};

/**
 * Ingest converter records, annotate shapes and partition the graph into
 * kernels.
 */
export function analyzeModel(
  records: unknown,
  options: AnalyzeOptions = {},
): ModelAnalysis {
  const logger = options.logger ?? createLogger("analyze");
  const graph = GraphIR.fromRecords(records);
  const shapes = inferShapes(graph, {
    heads: options.heads,
    patchMaxHops: options.patchMaxHops,
    logger,
  });

  const splitter = new KernelSplitter(options.policy ?? loadDefaultPolicy(), {
    logger,
  });
  const prefusedGraph = graph.clone();
  const prefused = splitter.preprocess(prefusedGraph);
  const blocks = splitter.partition(prefusedGraph);
  logger.info(
    `${graph.size} node(s) -> ${blocks.length} kernel(s), ${shapes.diagnostics.length} diagnostic(s)`,
  );
  return { graph, prefusedGraph, shapes, prefused, blocks };
}
