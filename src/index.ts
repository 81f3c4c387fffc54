export { analyzeModel, type AnalyzeOptions, type ModelAnalysis } from "./analyze";
export {
  DEFAULT_LOG_LEVEL,
  DEFAULT_PATCH_MAX_HOPS,
  type LogLevel,
  parseLogLevel,
  readConfig,
  type RuntimeConfig,
} from "./config";
export {
  FusionStateError,
  GraphCycleError,
  GraphIngestError,
  PolicyConfigError,
  UnknownNodeError,
} from "./errors";
export { type BasicBlock, FusionAwareGraph } from "./fusion/fusion-aware-graph";
export {
  collapseBlocks,
  KernelSplitter,
  type KernelSplitterOptions,
  type PrefusedUnit,
} from "./fusion/kernel-splitter";
export {
  opTypeMatcher,
  SubgraphMatcher,
  type SubgraphMatch,
  type TypeMatcher,
} from "./fusion/subgraph-matcher";
export { GraphIR } from "./graph/graph-ir";
export { parseGraphRecords } from "./graph/records";
export type {
  AttrValue,
  GraphNode,
  GraphRecords,
  NodeAttrs,
  NodeRecord,
  Shape,
} from "./graph/types";
export { createLogger, type Logger, silentLogger } from "./logging";
export {
  DEFAULT_RULE_FLAGS,
  type FusibilityEntry,
  FusibilityTable,
  FusionPolicy,
  type FusionPolicyInit,
  type FusionUnit,
  type MultiOutputMode,
  type RuleFlags,
} from "./policy/fusion-policy";
export {
  type FusionPolicyDocument,
  loadDefaultPolicy,
  parseFusionPolicyConfig,
  readFusionPolicy,
} from "./policy/policy-config";
export {
  inferShapes,
  type ShapeInferenceOptions,
  type ShapeInferenceReport,
} from "./shape/inference";
export { type OpKind, resolveOpKind } from "./shape/op-kinds";
export {
  broadcastUpperBound,
  elementCount,
  PLACEHOLDER_SHAPE,
  removeAxes,
} from "./shape/rules";
export type { DiagnosticKind, ShapeDiagnostic } from "./shape/types";
export {
  computeWindowedOutput,
  type Padding,
  type WindowResult,
  type WindowSpec,
} from "./shape/windowed";
