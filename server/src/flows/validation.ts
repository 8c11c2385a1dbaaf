import { z } from "zod";
import type { FlowDefinition, FlowNode } from "./types.js";

export type FlowValidationError = {
  message: string;
  nodeId?: string;
};

const nonEmptyString = (value: unknown) =>
  typeof value === "string" && value.trim().length > 0;

const FlowNodeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  type: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(["message", "question"])),
  content: z.string().optional().nullable(),
  variable: z.string().optional().nullable(),
  next: z
    .union([z.string(), z.number()])
    .optional()
    .nullable()
    .transform((value) => (value === null || value === undefined ? null : String(value))),
});

/**
 * Reads a stored flow definition. Nodes that cannot be understood are
 * dropped; the first node wins when ids repeat.
 */
export const parseFlowDefinition = (raw: unknown): FlowDefinition => {
  const container =
    raw && typeof raw === "object" && "nodes" in raw && Array.isArray(raw.nodes)
      ? raw.nodes
      : [];

  const seen = new Set<string>();
  const nodes: FlowNode[] = [];
  for (const candidate of container) {
    const parsed = FlowNodeSchema.safeParse(candidate);
    if (!parsed.success || !parsed.data.id || seen.has(parsed.data.id)) continue;
    seen.add(parsed.data.id);
    const variable = parsed.data.variable?.trim();
    nodes.push({
      id: parsed.data.id,
      type: parsed.data.type,
      content: parsed.data.content ?? "",
      ...(variable ? { variable } : {}),
      next: parsed.data.next,
    });
  }
  return { nodes };
};

/** Authoring checks for flow editors. The engine runs flows that fail them. */
export const validateFlowDefinition = (definition: FlowDefinition): FlowValidationError[] => {
  const errors: FlowValidationError[] = [];
  const nodes = definition.nodes ?? [];

  if (nodes.length === 0) {
    return [{ message: "Flow has no nodes." }];
  }

  const byId = new Map<string, FlowNode>();
  for (const node of nodes) {
    if (!nonEmptyString(node.id)) {
      errors.push({ message: "Every node needs an id." });
      continue;
    }
    if (byId.has(node.id)) {
      errors.push({ nodeId: node.id, message: "Node ids must be unique." });
      continue;
    }
    byId.set(node.id, node);
  }

  for (const node of byId.values()) {
    if (node.type === "question" && !nonEmptyString(node.variable)) {
      errors.push({ nodeId: node.id, message: "Question node needs a 'variable'." });
    }
    if (node.next !== null && !byId.has(node.next)) {
      errors.push({
        nodeId: node.id,
        message: `Next node '${node.next}' does not exist; the flow ends here.`,
      });
    }
  }

  // A loop made only of message nodes would never wait for input.
  const reported = new Set<string>();
  for (const start of byId.values()) {
    if (reported.has(start.id)) continue;
    const visited = new Set<string>();
    let current: FlowNode | undefined = start;
    while (current && current.type === "message") {
      if (visited.has(current.id)) {
        visited.forEach((id) => reported.add(id));
        errors.push({ nodeId: current.id, message: "Cycle without a question node." });
        break;
      }
      visited.add(current.id);
      current = current.next === null ? undefined : byId.get(current.next);
    }
  }

  return errors;
};
