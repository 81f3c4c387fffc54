import { z } from "zod";
import { GraphIngestError } from "../errors";
import type { AttrValue, GraphRecords, NodeRecord } from "./types";

const attrValueSchema: z.ZodType<AttrValue> = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.array(z.number()),
  z.array(z.array(z.number())),
  z.array(z.string()),
]);

const shapeSchema = z.array(z.number().int());

const nodeRecordSchema: z.ZodType<NodeRecord, z.ZodTypeDef, unknown> = z.object({
  type: z.string().min(1),
  attrs: z.record(z.string(), attrValueSchema).optional(),
  inbounds: z.array(z.string()).default([]),
  outbounds: z.array(z.string()).default([]),
  inputShape: z.array(shapeSchema).optional(),
  outputShape: z.array(shapeSchema).optional(),
  members: z.array(z.string()).min(1).optional(),
});

const graphRecordsSchema = z.record(z.string().min(1), nodeRecordSchema);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate converter output before it is turned into a GraphIR.
 */
export function parseGraphRecords(input: unknown): GraphRecords {
  const result = graphRecordsSchema.safeParse(input);
  if (!result.success) {
    throw new GraphIngestError(
      `invalid graph records: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}
