import type { CompletionClient } from "../ai/completion.js";
import type { FlowEngine } from "../flows/engine.js";
import { hasActiveFlow } from "../flows/engine.js";
import type { FlowRecord } from "../flows/types.js";
import { buildKnowledgeContext, buildSystemPrompt } from "../knowledge/context.js";
import type { RuleCache } from "../rules/cache.js";
import { matchRule } from "../rules/matcher.js";
import { formatUnknownError } from "../shared/errors.js";
import { KeyedMutex, leadLockKey } from "../shared/mutex.js";
import type { ChatResult, Lead } from "../shared/types.js";
import type { ChatStore } from "../store/types.js";

export type ResolveInput = {
  tenantId: string;
  /** Channel identity of the end user. Without it there is no lead, so flows are skipped. */
  senderId?: string | null;
  message: string;
};

export type ConversationResolver = {
  resolve: (input: ResolveInput) => Promise<ChatResult>;
};

/** Exact trigger match wins over a trigger contained in the message. Both ignore case. */
export const findTriggeredFlow = (flows: FlowRecord[], message: string): FlowRecord | null => {
  const normalized = message.trim().toLowerCase();
  if (!normalized) return null;
  const candidates = flows
    .filter((flow) => flow.isActive)
    .map((flow) => ({ flow, trigger: (flow.triggerKeyword ?? "").trim().toLowerCase() }))
    .filter((candidate) => candidate.trigger);
  const exact = candidates.find((candidate) => candidate.trigger === normalized);
  const contained = candidates.find((candidate) => normalized.includes(candidate.trigger));
  return exact?.flow ?? contained?.flow ?? null;
};

const hasText = (value: string | null): value is string => Boolean(value?.trim());

export const createConversationResolver = (deps: {
  store: ChatStore;
  flowEngine: FlowEngine;
  ruleCache: RuleCache;
  completion: CompletionClient;
  mutex?: KeyedMutex;
}): ConversationResolver => {
  const { store, flowEngine, ruleCache, completion } = deps;
  const mutex = deps.mutex ?? new KeyedMutex();

  /** Storage failures inside a stage count as "no answer" from that stage. */
  const attempt = async <T>(stage: string, tenantId: string, work: () => Promise<T>, fallback: T) => {
    try {
      return await work();
    } catch (error) {
      console.warn(`Resolver stage "${stage}" failed for tenant ${tenantId}:`, formatUnknownError(error));
      return fallback;
    }
  };

  const loadOrCreateLead = async (tenantId: string, senderId: string): Promise<Lead> =>
    (await store.getLead(tenantId, senderId)) ?? (await store.createLead(tenantId, senderId));

  const resolveFlow = async (input: ResolveInput, senderId: string): Promise<string | null> => {
    const { tenantId, message } = input;
    const lead = await attempt<Lead | null>("lead", tenantId, () => loadOrCreateLead(tenantId, senderId), null);
    if (!lead) return null;

    if (hasActiveFlow(lead)) {
      const reply = await flowEngine.processFlow(lead, message);
      if (hasText(reply)) return reply;
    }

    const flow = await attempt(
      "flow trigger",
      tenantId,
      async () => findTriggeredFlow(await store.listActiveTriggerFlows(tenantId), message),
      null
    );
    if (!flow) return null;
    const reply = await flowEngine.startFlow(lead, flow);
    return hasText(reply) ? reply : null;
  };

  const resolveRule = async (input: ResolveInput) => {
    const rules = await attempt("rules", input.tenantId, () => ruleCache.get(input.tenantId), []);
    return matchRule(rules, input.message);
  };

  const resolveAi = async (input: ResolveInput) => {
    const tenant = await attempt("tenant", input.tenantId, () => store.getTenant(input.tenantId), null);
    const knowledge = await attempt(
      "knowledge",
      input.tenantId,
      () => store.listActiveKnowledge(input.tenantId),
      []
    );
    return completion.complete({
      systemPrompt: buildSystemPrompt(tenant, buildKnowledgeContext(knowledge)),
      userMessage: input.message,
    });
  };

  const runPipeline = async (input: ResolveInput, senderId: string | null): Promise<ChatResult> => {
    if (senderId) {
      const flowReply = await resolveFlow(input, senderId);
      if (flowReply !== null) return { response: flowReply, source: "flow" };
    }

    const rule = await resolveRule(input);
    if (rule) return { response: rule.responseText, source: "bot" };

    return { response: await resolveAi(input), source: "ai" };
  };

  const resolve = async (input: ResolveInput) => {
    const senderId = input.senderId?.trim() || null;
    if (!senderId) return runPipeline(input, null);
    return mutex.runExclusive(leadLockKey(input.tenantId, senderId), () => runPipeline(input, senderId));
  };

  return { resolve };
};
