import type { GraphIR } from "../graph/graph-ir";
import type { GraphNode, Shape } from "../graph/types";
import { readFlatInts, readInt, readIntList, readString } from "./attrs";
import { type OpKind, resolveOpKind } from "./op-kinds";
import type { RuleContext, ShapeResult, ShapeRule } from "./types";
import { computeWindowedOutput, dilatedExtent, parsePadding } from "./windowed";

/** Shape written to pack / strided-slice nodes when no reshape explains them. */
export const PLACEHOLDER_SHAPE: Shape = [0, 0, 0, 0];

const UNIT_STRIDES = [1, 1, 1, 1];

/** Reduce ops that carry no axes and always pool over H and W. */
const SPATIAL_REDUCTIONS = new Set(["GlobalAveragePooling2D", "GlobalMaxPooling2D"]);

export function elementCount(shape: Shape): number {
  return Math.abs(shape.reduce((acc, dim) => acc * dim, 1));
}

/**
 * Broadcasting upper bound: the highest-rank shape wins; shapes of equal rank
 * are merged by per-axis maximum.
 */
export function broadcastUpperBound(shapes: Shape[]): Shape {
  let target: Shape = [];
  for (const shape of shapes) {
    if (shape.length > target.length) {
      target = shape.slice();
    } else if (shape.length === target.length) {
      target = target.map((dim, axis) => Math.max(dim, shape[axis]));
    }
  }
  return target;
}

/**
 * Remove `axes` from `shape`. Axes are removed in ascending order, each
 * removal shifting the index of the ones after it.
 */
export function removeAxes(shape: Shape, axes: number[]): Shape {
  const sorted = Array.from(new Set(axes)).sort((a, b) => a - b);
  const out = shape.slice();
  sorted.forEach((axis, removed) => {
    out.splice(axis - removed, 1);
  });
  return out;
}

function normalizeAxis(axis: number, rank: number): number | undefined {
  const resolved = axis < 0 ? axis + rank : axis;
  return resolved >= 0 && resolved < rank ? resolved : undefined;
}

function kindOf(node: GraphNode): OpKind | undefined {
  return resolveOpKind(node.type);
}

function firstOutput(node: GraphNode): Shape | undefined {
  const shape = node.outputShape?.[0];
  return shape ? shape.slice() : undefined;
}

function outputOf(node: GraphNode, ctx: RuleContext): Shape | undefined {
  const shape = firstOutput(node);
  if (!shape) {
    ctx.report("malformed_topology", `predecessor ${node.id} has no output shape`);
  }
  return shape;
}

/** Producers that are not constant payloads or pack-built parameter lists. */
function dataInputs(graph: GraphIR, node: GraphNode): GraphNode[] {
  return graph.inboundNodes(node).filter((input) => {
    const kind = kindOf(input);
    return kind !== "const" && kind !== "pack";
  });
}

function constInputs(graph: GraphIR, node: GraphNode): GraphNode[] {
  return graph.inboundNodes(node).filter((input) => kindOf(input) === "const");
}

type WeightEdge = {
  weight: GraphNode;
  /** The producer the edge actually comes from: the const or its identity. */
  via: string;
};

/** Const producers, either direct or read through an Identity. */
function findWeights(graph: GraphIR, node: GraphNode): WeightEdge[] {
  const found: WeightEdge[] = [];
  for (const input of graph.inboundNodes(node)) {
    const kind = kindOf(input);
    if (kind === "const") {
      found.push({ weight: input, via: input.id });
    } else if (kind === "identity" && input.inbounds.length === 1) {
      const source = graph.require(input.inbounds[0]);
      if (kindOf(source) === "const") {
        found.push({ weight: source, via: input.id });
      }
    }
  }
  return found;
}

function weightShapeOf(weight: GraphNode): Shape | undefined {
  return readIntList(weight, "tensorShape") ?? firstOutput(weight);
}

type WeightedInput = { input: Shape; weight: Shape };

function weightedInput(
  graph: GraphIR,
  node: GraphNode,
  ctx: RuleContext,
  weightRank: number,
): WeightedInput | undefined {
  const weights = findWeights(graph, node);
  if (weights.length !== 1) {
    ctx.report(
      "malformed_topology",
      `expected exactly one weight input, found ${weights.length}`,
    );
    return undefined;
  }
  const [{ weight, via }] = weights;
  const inputs = node.inbounds.filter((id) => id !== via);
  if (inputs.length !== 1) {
    ctx.report(
      "malformed_topology",
      `expected exactly one data input, found ${inputs.length}`,
    );
    return undefined;
  }
  const input = outputOf(graph.require(inputs[0]), ctx);
  if (!input) {
    return undefined;
  }
  const weightShape = weightShapeOf(weight);
  if (!weightShape || weightShape.length !== weightRank) {
    ctx.report(
      "malformed_topology",
      `weight ${weight.id} shape [${weightShape ?? []}] is not ${weightRank}-D`,
    );
    return undefined;
  }
  return { input, weight: weightShape };
}

/**
 * 4-element NHWC stride / dilation list: unit batch and channel entries,
 * positive spatial entries.
 */
function readSpatialPair(
  node: GraphNode,
  key: string,
  ctx: RuleContext,
): [number, number] | undefined {
  const values = readIntList(node, key) ?? UNIT_STRIDES;
  if (
    values.length !== 4 ||
    values[0] !== 1 ||
    values[3] !== 1 ||
    values[1] < 1 ||
    values[2] < 1
  ) {
    ctx.report("invalid_attribute", `invalid ${key} [${values}]`);
    return undefined;
  }
  return [values[1], values[2]];
}

function requireRank4(shape: Shape, ctx: RuleContext): boolean {
  if (shape.length !== 4) {
    ctx.report("malformed_topology", `expected a 4-D NHWC input, got [${shape}]`);
    return false;
  }
  return true;
}

type WindowParams = {
  kernel: [number, number];
  dilation: [number, number];
};

function windowed(
  node: GraphNode,
  input: Shape,
  channels: number,
  params: WindowParams,
  ctx: RuleContext,
): ShapeResult | undefined {
  const stride = readSpatialPair(node, "strides", ctx);
  if (!stride) {
    return undefined;
  }
  const padding = parsePadding(readString(node, "padding"));
  if (!padding) {
    ctx.report(
      "invalid_attribute",
      `unexpected padding ${readString(node, "padding") ?? "<missing>"}`,
    );
    return undefined;
  }
  const { output, pads } = computeWindowedOutput({
    input: [input[1], input[2]],
    kernel: [
      dilatedExtent(params.kernel[0], params.dilation[0]),
      dilatedExtent(params.kernel[1], params.dilation[1]),
    ],
    stride,
    padding,
  });
  return {
    inputShape: [input],
    outputShape: [[input[0], output[0], output[1], channels]],
    attrs: { kernelShape: params.kernel.slice(), pads },
  };
}

function convolution(channelAxis: 2 | 3): ShapeRule {
  return (graph, node, ctx) => {
    const operands = weightedInput(graph, node, ctx, 4);
    if (!operands || !requireRank4(operands.input, ctx)) {
      return undefined;
    }
    const dilation = readSpatialPair(node, "dilations", ctx);
    if (!dilation) {
      return undefined;
    }
    const { input, weight } = operands;
    const result = windowed(
      node,
      input,
      weight[channelAxis],
      { kernel: [weight[0], weight[1]], dilation },
      ctx,
    );
    if (result) {
      result.attrs = { ...result.attrs, weightShape: weight.slice() };
    }
    return result;
  };
}

const pool: ShapeRule = (graph, node, ctx) => {
  if (node.inbounds.length !== 1) {
    ctx.report(
      "malformed_topology",
      `expected exactly one input, found ${node.inbounds.length}`,
    );
    return undefined;
  }
  const input = outputOf(graph.require(node.inbounds[0]), ctx);
  if (!input || !requireRank4(input, ctx)) {
    return undefined;
  }
  const ksize = readIntList(node, "ksize");
  if (!ksize || ksize.length !== 4 || ksize[1] < 1 || ksize[2] < 1) {
    ctx.report("invalid_attribute", `invalid ksize [${ksize ?? []}]`);
    return undefined;
  }
  return windowed(
    node,
    input,
    input[3],
    { kernel: [ksize[1], ksize[2]], dilation: [1, 1] },
    ctx,
  );
};

const declared: ShapeRule = (_graph, node, ctx) => {
  const shape = readIntList(node, "tensorShape") ?? readIntList(node, "shape");
  if (!shape) {
    ctx.report("invalid_attribute", "no tensorShape or shape attribute");
    return undefined;
  }
  return { inputShape: [], outputShape: [shape] };
};

const propagate: ShapeRule = (graph, node, ctx) => {
  const data = dataInputs(graph, node);
  const source = data[0] ?? graph.inboundNodes(node)[0];
  if (!source) {
    ctx.report("malformed_topology", "no predecessor to propagate from");
    return undefined;
  }
  const shape = outputOf(source, ctx);
  if (!shape) {
    return undefined;
  }
  return { inputShape: [shape], outputShape: [shape.slice()] };
};

const broadcast: ShapeRule = (graph, node, ctx) => {
  const inputs = graph.inboundNodes(node);
  if (inputs.length === 0) {
    ctx.report("malformed_topology", "broadcast op has no inputs");
    return undefined;
  }
  if (inputs.length < 2) {
    ctx.report(
      "malformed_topology",
      `broadcast op expects two or more inputs, found ${inputs.length}`,
    );
  }
  const shapes: Shape[] = [];
  for (const input of inputs) {
    const shape = outputOf(input, ctx);
    if (!shape) {
      return undefined;
    }
    shapes.push(shape);
  }
  return { inputShape: shapes, outputShape: [broadcastUpperBound(shapes)] };
};

const matmul: ShapeRule = (graph, node, ctx) => {
  const operands = weightedInput(graph, node, ctx, 2);
  if (!operands) {
    return undefined;
  }
  const { input, weight } = operands;
  const feature = input.length - 1;
  if (feature < 0 || input[feature] !== weight[0]) {
    ctx.report(
      "shape_mismatch",
      `input [${input}] does not match weight [${weight}]`,
    );
    return undefined;
  }
  const output = input.slice();
  output[feature] = weight[1];
  return {
    inputShape: [input],
    outputShape: [output],
    attrs: { weightShape: weight.slice() },
  };
};

/** Integer list from the first const producer carrying a `constant` payload. */
function constPayload(graph: GraphIR, node: GraphNode): number[] | undefined {
  for (const input of constInputs(graph, node)) {
    const payload = readFlatInts(input, "constant");
    if (payload) return payload;
  }
  return undefined;
}

/**
 * Parameter list (target shape, permutation) supplied by a Const producer or
 * built by a Pack producer; a packed list gets a leading batch dimension.
 */
function parameterList(graph: GraphIR, node: GraphNode): number[] | undefined {
  let found: number[] | undefined;
  for (const input of graph.inboundNodes(node)) {
    const kind = kindOf(input);
    if (kind === "const") {
      found = readFlatInts(input, "constant") ?? found;
    } else if (kind === "pack") {
      const packed = readFlatInts(input, "constant");
      if (packed) found = [1, ...packed];
    }
  }
  return found;
}

function singleDataInput(
  graph: GraphIR,
  node: GraphNode,
  ctx: RuleContext,
): Shape | undefined {
  const data = dataInputs(graph, node);
  if (data.length !== 1) {
    ctx.report(
      "malformed_topology",
      `expected exactly one data input, found ${data.length}`,
    );
    return undefined;
  }
  return outputOf(data[0], ctx);
}

const reduce: ShapeRule = (graph, node, ctx) => {
  const input = singleDataInput(graph, node, ctx);
  if (!input) {
    return undefined;
  }
  const axes =
    readIntList(node, "reductionIndices") ??
    readIntList(node, "axes") ??
    constPayload(graph, node) ??
    (SPATIAL_REDUCTIONS.has(node.type) ? [1, 2] : undefined);
  if (!axes) {
    ctx.report("invalid_attribute", "no reduction axes");
    return undefined;
  }
  const normalized: number[] = [];
  for (const axis of axes) {
    const resolved = normalizeAxis(axis, input.length);
    if (resolved === undefined) {
      ctx.report("invalid_attribute", `reduction axis ${axis} out of range for [${input}]`);
      return undefined;
    }
    normalized.push(resolved);
  }
  return { inputShape: [input], outputShape: [removeAxes(input, normalized)] };
};

const reshape: ShapeRule = (graph, node, ctx) => {
  const input = singleDataInput(graph, node, ctx);
  if (!input) {
    return undefined;
  }
  const target = readIntList(node, "shape") ?? parameterList(graph, node);
  if (!target) {
    ctx.report("malformed_topology", "no target shape attribute or producer");
    return undefined;
  }
  if (elementCount(input) !== elementCount(target)) {
    ctx.report(
      "shape_mismatch",
      `input [${input}] and target [${target}] differ in element count`,
    );
  }
  return { inputShape: [input], outputShape: [target] };
};

function scalarConstAxis(graph: GraphIR, node: GraphNode): number | undefined {
  for (const input of constInputs(graph, node)) {
    const axis = readInt(input, "constant");
    if (axis !== undefined) return axis;
  }
  return undefined;
}

const concat: ShapeRule = (graph, node, ctx) => {
  const shapes: Shape[] = [];
  for (const input of graph.inboundNodes(node)) {
    const shape = outputOf(input, ctx);
    if (!shape) {
      return undefined;
    }
    if (shape.length > 0) {
      shapes.push(shape);
    }
  }
  if (shapes.length === 0) {
    ctx.report("malformed_topology", "concat has no non-scalar inputs");
    return undefined;
  }
  const rawAxis = readInt(node, "axis") ?? scalarConstAxis(graph, node);
  const axis =
    rawAxis === undefined ? undefined : normalizeAxis(rawAxis, shapes[0].length);
  if (axis === undefined) {
    ctx.report("invalid_attribute", `invalid concat axis ${rawAxis ?? "<missing>"}`);
    return undefined;
  }
  const output = shapes[0].slice();
  for (const shape of shapes.slice(1)) {
    output[axis] += shape[axis];
  }
  return { inputShape: shapes, outputShape: [output] };
};

const split: ShapeRule = (graph, node, ctx) => {
  const input = singleDataInput(graph, node, ctx);
  if (!input) {
    return undefined;
  }
  const rawAxis =
    readInt(node, "splitDim") ?? readInt(node, "axis") ?? scalarConstAxis(graph, node);
  const axis = rawAxis === undefined ? undefined : normalizeAxis(rawAxis, input.length);
  if (axis === undefined) {
    ctx.report("invalid_attribute", `invalid split axis ${rawAxis ?? "<missing>"}`);
    return undefined;
  }
  const parts = node.outbounds.length;
  if (parts === 0) {
    ctx.report("malformed_topology", "split has no consumers");
    return undefined;
  }
  const piece = input.slice();
  piece[axis] = Math.trunc(piece[axis] / parts);
  return {
    inputShape: [input],
    outputShape: Array.from({ length: parts }, () => piece.slice()),
  };
};

const transpose: ShapeRule = (graph, node, ctx) => {
  const input = singleDataInput(graph, node, ctx);
  if (!input) {
    return undefined;
  }
  const perm = readIntList(node, "perm") ?? parameterList(graph, node);
  if (!perm) {
    ctx.report("malformed_topology", "no permutation attribute or producer");
    return undefined;
  }
  if (perm.some((axis) => axis < 0 || axis >= input.length)) {
    ctx.report("invalid_attribute", `permutation [${perm}] out of range for [${input}]`);
    return undefined;
  }
  return { inputShape: [input], outputShape: [perm.map((axis) => input[axis])] };
};

/**
 * Pack / strided-slice shapes are borrowed from the first reshape within
 * `patchMaxHops` downstream that already recorded its input shape.
 */
const borrowFromReshape: ShapeRule = (graph, node, ctx) => {
  for (const next of graph.downstream(node.id, ctx.patchMaxHops)) {
    if (kindOf(next) === "reshape" && next.inputShape) {
      return {
        inputShape: next.inputShape.map((shape) => shape.slice()),
        outputShape: next.inputShape.map((shape) => shape.slice()),
      };
    }
  }
  return {
    inputShape: [PLACEHOLDER_SHAPE.slice()],
    outputShape: [PLACEHOLDER_SHAPE.slice()],
  };
};

export const SHAPE_RULES: Record<OpKind, ShapeRule> = {
  const: declared,
  placeholder: declared,
  identity: propagate,
  propagate,
  broadcast,
  conv: convolution(3),
  depthwise_conv: convolution(2),
  pool,
  matmul,
  reduce,
  reshape,
  concat,
  split,
  transpose,
  pack: borrowFromReshape,
  strided_slice: borrowFromReshape,
};
