import { GraphIR } from "../../src/graph/graph-ir";
import type { GraphRecords, NodeAttrs } from "../../src/graph/types";

export type NodeSpec = { type: string; attrs?: NodeAttrs };

/**
 * Records with edges written on both endpoints, in the order given.
 */
export function makeRecords(
  nodes: Record<string, NodeSpec | string>,
  edges: Array<[string, string]> = [],
): GraphRecords {
  const records: GraphRecords = {};
  for (const [id, spec] of Object.entries(nodes)) {
    const { type, attrs } = typeof spec === "string" ? { type: spec, attrs: undefined } : spec;
    records[id] = { type, attrs: attrs ?? {}, inbounds: [], outbounds: [] };
  }
  for (const [from, to] of edges) {
    records[from].outbounds.push(to);
    records[to].inbounds.push(from);
  }
  return records;
}

export function makeGraph(
  nodes: Record<string, NodeSpec | string>,
  edges: Array<[string, string]> = [],
): GraphIR {
  return GraphIR.fromRecords(makeRecords(nodes, edges));
}

/**
 * Small NHWC image classifier:
 * input -> conv -> bn -> relu -> dw -> pool -> mean -> fc -> bias
 */
export function convNetRecords(): GraphRecords {
  return makeRecords(
    {
      input: { type: "Placeholder", attrs: { shape: [1, 32, 32, 3] } },
      w: { type: "Const", attrs: { tensorShape: [3, 3, 3, 16] } },
      conv: {
        type: "Conv2D",
        attrs: { strides: [1, 2, 2, 1], padding: "SAME" },
      },
      bn: "FusedBatchNorm",
      relu: "Relu",
      dw_w: { type: "Const", attrs: { tensorShape: [3, 3, 16, 1] } },
      dw: {
        type: "DepthwiseConv2dNative",
        attrs: { strides: [1, 1, 1, 1], dilations: [1, 2, 2, 1], padding: "VALID" },
      },
      pool: {
        type: "MaxPool",
        attrs: { ksize: [1, 2, 2, 1], strides: [1, 2, 2, 1], padding: "VALID" },
      },
      mean: { type: "Mean", attrs: { reductionIndices: [1, 2] } },
      fc_w: { type: "Const", attrs: { tensorShape: [16, 10] } },
      fc: "MatMul",
      bias_b: { type: "Const", attrs: { tensorShape: [10] } },
      bias: "BiasAdd",
    },
    [
      ["input", "conv"],
      ["w", "conv"],
      ["conv", "bn"],
      ["bn", "relu"],
      ["relu", "dw"],
      ["dw_w", "dw"],
      ["dw", "pool"],
      ["pool", "mean"],
      ["mean", "fc"],
      ["fc_w", "fc"],
      ["fc", "bias"],
      ["bias_b", "bias"],
    ],
  );
}

/** Sorted, comparable view of a partition. */
export function partitionKey(blocks: Array<{ nodeIds: string[] }>): string[] {
  return blocks.map((block) => block.nodeIds.slice().sort().join(",")).sort();
}
