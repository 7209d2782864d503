import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ValidationError, type NetworkViolation } from "../errors.js";
import { BooleanNetwork } from "./model.js";

/** Truth-table entries may be written as booleans or as 0/1 literals. */
const TruthEntrySchema = z
  .union([z.boolean(), z.literal(0), z.literal(1)])
  .transform((value) => value === true || value === 1);

const NodeDescriptorSchema = z
  .object({
    parents: z.array(z.number().int()),
    truthTable: z.array(TruthEntrySchema),
  })
  .strict();

/** JSON shape accepted by {@link parseNetworkDescriptor}. */
export const NetworkDescriptorSchema = z
  .object({
    nodes: z.array(NodeDescriptorSchema),
  })
  .strict();

export type NetworkDescriptor = z.input<typeof NetworkDescriptorSchema>;

/**
 * Builds a network from an untrusted JSON value. Schema issues and structural
 * violations are both reported through {@link ValidationError}.
 */
export function parseNetworkDescriptor(input: unknown): BooleanNetwork {
  const parsed = NetworkDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const violations: NetworkViolation[] = parsed.error.issues.map((issue) => ({
      path: `/${issue.path.join("/")}`,
      message: issue.message,
      hint: "network_descriptor_invalid",
    }));
    throw new ValidationError(violations);
  }
  return BooleanNetwork.create(parsed.data.nodes);
}

/** Reads a JSON descriptor from disk. */
export async function loadNetworkFile(path: string): Promise<BooleanNetwork> {
  const contents = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ValidationError([
      {
        path: "/",
        message: `network file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    ]);
  }
  return parseNetworkDescriptor(raw);
}
