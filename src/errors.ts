export class GraphIngestError extends Error {
  name = "GraphIngestError";
}

export class UnknownNodeError extends Error {
  name = "UnknownNodeError";
}

export class GraphCycleError extends Error {
  name = "GraphCycleError";
}

export class PolicyConfigError extends Error {
  name = "PolicyConfigError";
}

export class FusionStateError extends Error {
  name = "FusionStateError";
}
