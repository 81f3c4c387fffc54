/** Ordered tensor dimensions, NHWC for 4-D activations. */
export type Shape = number[];

export type AttrValue =
  | number
  | string
  | boolean
  | number[]
  | number[][]
  | string[];

/** Op-specific parameters: kernel size, strides, padding, constant payloads, ... */
export type NodeAttrs = Record<string, AttrValue>;

export type GraphNode = {
  /** Dense arena index, assigned on insertion and never reused. */
  index: number;
  id: string;
  type: string;
  attrs: NodeAttrs;
  inputShape?: Shape[];
  outputShape?: Shape[];
  /** Producer ids, in operand order. */
  inbounds: string[];
  /** Consumer ids, in edge order. */
  outbounds: string[];
  /** Original node ids this node stands for (grows when nodes are merged). */
  members: string[];
};

/**
 * One node as handed over by a graph converter. Shapes are optional on input
 * and populated on output.
 */
export type NodeRecord = {
  type: string;
  attrs?: NodeAttrs;
  inbounds: string[];
  outbounds: string[];
  inputShape?: Shape[];
  outputShape?: Shape[];
  members?: string[];
};

export type GraphRecords = Record<string, NodeRecord>;
