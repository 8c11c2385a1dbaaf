export type FlowNodeType = "message" | "question";

export type FlowNode = {
  id: string;
  type: FlowNodeType;
  content: string;
  /** Question nodes only: name under which the next user reply is stored. */
  variable?: string;
  next: string | null;
};

export type FlowDefinition = {
  nodes: FlowNode[];
};

export type FlowRecord = {
  id: string;
  tenantId: string;
  name: string;
  triggerKeyword?: string | null;
  isActive: boolean;
  definition: FlowDefinition;
};

export type FlowState =
  | { kind: "idle" }
  | { kind: "waiting"; flowId: string; nodeId: string };
