import { readFileSync } from "node:fs";
import { z } from "zod";
import { PolicyConfigError } from "../errors";
import defaultPolicyDocument from "./default-policy.json";
import {
  FusibilityTable,
  FusionPolicy,
  type FusionUnit,
  type MultiOutputMode,
} from "./fusion-policy";

/** Numeric codes of the multiplicity switch in rule-test output. */
const MULTI_OUTPUT_CODES: readonly MultiOutputMode[] = ["forbid", "first", "all"];

const multiOutputSchema = z.union([
  z.enum(["forbid", "first", "all"]),
  z
    .number()
    .int()
    .min(0)
    .max(2)
    .transform((code) => MULTI_OUTPUT_CODES[code]),
]);

const flagsSchema = z
  .object({
    multiOutput: multiOutputSchema.optional(),
    requireReady: z.boolean().optional(),
  })
  .strict();

const unitSchema = z.object({
  name: z.string().min(1),
  nodes: z.record(z.string().min(1), z.array(z.string().min(1)).min(1)),
  edges: z.array(z.tuple([z.string(), z.string()])).default([]),
});

const policySchema = z
  .object({
    flags: flagsSchema.default({}),
    units: z.array(unitSchema).default([]),
    fusible: z.record(z.string(), z.record(z.string(), z.boolean())).default({}),
  })
  .strict();

export type FusionPolicyDocument = z.input<typeof policySchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a policy document and build the immutable policy it describes.
 */
export function parseFusionPolicyConfig(input: unknown): FusionPolicy {
  const result = policySchema.safeParse(input);
  if (!result.success) {
    throw new PolicyConfigError(
      `invalid fusion policy: ${formatIssues(result.error)}`,
    );
  }
  const { flags, units, fusible } = result.data;
  const parsedUnits: FusionUnit[] = units.map((unit) => ({
    name: unit.name,
    nodes: unit.nodes,
    edges: unit.edges,
  }));
  return new FusionPolicy({
    units: parsedUnits,
    table: FusibilityTable.fromNested(fusible),
    flags,
  });
}

export function readFusionPolicy(path: string): FusionPolicy {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new PolicyConfigError(
      `cannot read fusion policy ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseFusionPolicyConfig(document);
}

/** Policy bundled with the package. */
export function loadDefaultPolicy(): FusionPolicy {
  return parseFusionPolicyConfig(defaultPolicyDocument);
}
