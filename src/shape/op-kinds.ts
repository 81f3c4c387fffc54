/**
 * Shape-rule families. Every op type the inference pass understands maps to
 * exactly one kind; anything else is reported as unsupported.
 */
export type OpKind =
  | "const"
  | "placeholder"
  | "identity"
  | "propagate"
  | "broadcast"
  | "conv"
  | "depthwise_conv"
  | "pool"
  | "matmul"
  | "reduce"
  | "reshape"
  | "concat"
  | "split"
  | "transpose"
  | "pack"
  | "strided_slice";

const OP_TYPES_BY_KIND: Record<OpKind, readonly string[]> = {
  const: ["Const"],
  placeholder: ["Placeholder"],
  identity: ["Identity"],
  propagate: [
    "Relu",
    "Relu6",
    "LeakyReLU",
    "LeakyRelu",
    "Sigmoid",
    "Tanh",
    "Swish",
    "HardSwish",
    "HardSigmoid",
    "FusedBatchNorm",
    "FusedBatchNormV3",
    "BiasAdd",
  ],
  broadcast: ["Add", "AddV2", "Mul"],
  conv: ["Conv2D"],
  depthwise_conv: ["DepthwiseConv2dNative"],
  pool: ["AvgPool", "MaxPool", "AveragePooling2D", "MaxPooling2D"],
  matmul: ["MatMul"],
  reduce: ["Mean", "GlobalAveragePooling2D", "GlobalMaxPooling2D"],
  reshape: ["Reshape"],
  concat: ["Concat", "ConcatV2", "Concatenate"],
  split: ["Split"],
  transpose: ["Transpose"],
  pack: ["Pack", "Packed"],
  strided_slice: ["StridedSlice"],
};

const KIND_BY_OP_TYPE = new Map<string, OpKind>();
for (const [kind, opTypes] of Object.entries(OP_TYPES_BY_KIND)) {
  for (const opType of opTypes) {
    if (isOpKind(kind)) KIND_BY_OP_TYPE.set(opType, kind);
  }
}

export function isOpKind(name: string): name is OpKind {
  return Object.prototype.hasOwnProperty.call(OP_TYPES_BY_KIND, name);
}

export function resolveOpKind(opType: string): OpKind | undefined {
  return KIND_BY_OP_TYPE.get(opType);
}

/** Kinds whose shape can only be recovered from a downstream reshape. */
export const DEFERRED_KINDS: ReadonlySet<OpKind> = new Set<OpKind>([
  "pack",
  "strided_slice",
]);
