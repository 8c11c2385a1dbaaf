import type { ChatStore } from "../store/types.js";
import type { FlowContext, Lead } from "../shared/types.js";
import { FlowStateError, formatUnknownError } from "../shared/errors.js";
import type { FlowNode, FlowRecord, FlowState } from "./types.js";

/** Returned by node lookups when a `next` pointer leads nowhere. */
export const END_OF_FLOW = Symbol("END_OF_FLOW");
export type EndOfFlow = typeof END_OF_FLOW;

export const START_NODE_ID = "start";

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Fills `{variable}` placeholders from the flow context. If any placeholder
 * has no value, the template is returned untouched.
 */
export const renderTemplate = (template: string, context: FlowContext) => {
  let missing = false;
  const rendered = template.replace(PLACEHOLDER, (match, key: string) => {
    if (Object.prototype.hasOwnProperty.call(context, key)) return context[key] ?? "";
    missing = true;
    return match;
  });
  return missing ? template : rendered;
};

export const getFlowState = (lead: Lead): FlowState =>
  lead.currentFlowId !== null && lead.currentStepId !== null
    ? { kind: "waiting", flowId: lead.currentFlowId, nodeId: lead.currentStepId }
    : { kind: "idle" };

export const hasActiveFlow = (lead: Lead) => getFlowState(lead).kind === "waiting";

export type NodeIndex = {
  lookup: (nodeId: string | null | undefined) => FlowNode | EndOfFlow;
  startNode: () => FlowNode | EndOfFlow;
};

export const indexFlowNodes = (flow: FlowRecord): NodeIndex => {
  const nodes = flow.definition.nodes ?? [];
  const byId = new Map<string, FlowNode>();
  for (const node of nodes) {
    if (!byId.has(node.id)) byId.set(node.id, node);
  }
  const lookup = (nodeId: string | null | undefined) =>
    nodeId === null || nodeId === undefined ? END_OF_FLOW : byId.get(nodeId) ?? END_OF_FLOW;
  return {
    lookup,
    startNode: () => byId.get(START_NODE_ID) ?? nodes[0] ?? END_OF_FLOW,
  };
};

export type FlowEngine = {
  startFlow: (lead: Lead, flow: FlowRecord) => Promise<string | null>;
  processFlow: (lead: Lead, userMessage: string) => Promise<string | null>;
  runTraversal: (lead: Lead, flow: FlowRecord, startNodeId: string | null) => Promise<string | null>;
  clearFlowState: (lead: Lead) => Promise<void>;
};

export const createFlowEngine = (deps: { store: ChatStore }): FlowEngine => {
  const { store } = deps;

  const clearFlowState = async (lead: Lead) => {
    lead.currentFlowId = null;
    lead.currentStepId = null;
    lead.flowContext = {};
    await store.saveFlowState(lead);
  };

  const abort = async (lead: Lead, reason: FlowStateError) => {
    console.warn(
      `Flow aborted for lead ${lead.id} (flow=${reason.flowId ?? "-"}, node=${reason.nodeId ?? "-"}): ${reason.message}`
    );
    await clearFlowState(lead);
    return null;
  };

  const runTraversal = async (lead: Lead, flow: FlowRecord, startNodeId: string | null) => {
    const index = indexFlowNodes(flow);
    const first = index.lookup(startNodeId);
    if (first === END_OF_FLOW) {
      return abort(
        lead,
        new FlowStateError("Start node does not resolve.", {
          flowId: flow.id,
          nodeId: startNodeId ?? undefined,
        })
      );
    }

    const responses: string[] = [];
    const visited = new Set<string>();
    let current: FlowNode | EndOfFlow = first;

    while (current !== END_OF_FLOW) {
      if (visited.has(current.id)) {
        console.warn(`Flow ${flow.id} loops through message nodes at '${current.id}'; ending flow.`);
        break;
      }
      visited.add(current.id);
      responses.push(renderTemplate(current.content ?? "", lead.flowContext));

      if (current.type === "question") {
        lead.currentFlowId = flow.id;
        lead.currentStepId = current.id;
        await store.saveFlowState(lead);
        return responses.join("\n\n");
      }
      current = index.lookup(current.next);
    }

    await clearFlowState(lead);
    const text = responses.join("\n\n");
    return text.trim() ? text : null;
  };

  const startFlow = async (lead: Lead, flow: FlowRecord) => {
    try {
      lead.currentFlowId = flow.id;
      lead.currentStepId = null;
      lead.flowContext = {};
      const start = indexFlowNodes(flow).startNode();
      if (start === END_OF_FLOW) {
        return await abort(lead, new FlowStateError("Flow has no nodes.", { flowId: flow.id }));
      }
      return await runTraversal(lead, flow, start.id);
    } catch (error) {
      console.error(`Flow start failed (flow=${flow.id}):`, formatUnknownError(error));
      return null;
    }
  };

  const processFlow = async (lead: Lead, userMessage: string) => {
    const state = getFlowState(lead);
    if (state.kind !== "waiting") return null;

    try {
      const flow = await store.getFlow(state.flowId);
      if (!flow || !flow.isActive) {
        return await abort(
          lead,
          new FlowStateError(flow ? "Flow is inactive." : "Flow no longer exists.", {
            flowId: state.flowId,
          })
        );
      }

      const node = indexFlowNodes(flow).lookup(state.nodeId);
      if (node === END_OF_FLOW) {
        return await abort(
          lead,
          new FlowStateError("Current node no longer exists.", {
            flowId: flow.id,
            nodeId: state.nodeId,
          })
        );
      }

      if (node.variable) {
        lead.flowContext = { ...lead.flowContext, [node.variable]: userMessage };
      }
      if (node.next === null) {
        await clearFlowState(lead);
        return null;
      }
      return await runTraversal(lead, flow, node.next);
    } catch (error) {
      console.error(`Flow step failed (flow=${state.flowId}):`, formatUnknownError(error));
      return null;
    }
  };

  return { startFlow, processFlow, runTraversal, clearFlowState };
};
