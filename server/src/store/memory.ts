import crypto from "crypto";
import type {
  ChannelIntegration,
  ChannelType,
  KnowledgeItem,
  Lead,
  QuickReply,
  ScriptedResponse,
  Tenant,
} from "../shared/types.js";
import type { FlowRecord } from "../flows/types.js";
import type { ChatStore, LeadContactInput } from "./types.js";

export type InMemorySeed = {
  tenants?: Tenant[];
  leads?: Lead[];
  flows?: FlowRecord[];
  rules?: ScriptedResponse[];
  quickReplies?: QuickReply[];
  knowledge?: KnowledgeItem[];
  integrations?: ChannelIntegration[];
};

const copyLead = (lead: Lead): Lead => ({ ...lead, flowContext: { ...lead.flowContext } });

const leadKey = (tenantId: string, phoneNumber: string) => `${tenantId}:${phoneNumber}`;

/**
 * Process-local store. Used when Supabase is not configured and as the
 * stand-in for storage in tests. Collections keep insertion order, which is
 * the listing order the resolver relies on.
 */
export class InMemoryChatStore implements ChatStore {
  readonly tenants = new Map<string, Tenant>();
  readonly leads = new Map<string, Lead>();
  readonly flows = new Map<string, FlowRecord>();
  readonly rules: ScriptedResponse[] = [];
  readonly quickReplies: QuickReply[] = [];
  readonly knowledge: KnowledgeItem[] = [];
  readonly integrations: ChannelIntegration[] = [];

  constructor(seed: InMemorySeed = {}) {
    seed.tenants?.forEach((tenant) => this.tenants.set(tenant.id, tenant));
    seed.leads?.forEach((lead) =>
      this.leads.set(leadKey(lead.tenantId, lead.phoneNumber), copyLead(lead))
    );
    seed.flows?.forEach((flow) => this.flows.set(flow.id, flow));
    this.rules.push(...(seed.rules ?? []));
    this.quickReplies.push(...(seed.quickReplies ?? []));
    this.knowledge.push(...(seed.knowledge ?? []));
    this.integrations.push(...(seed.integrations ?? []));
  }

  async getTenant(tenantId: string) {
    return this.tenants.get(tenantId) ?? null;
  }

  async getTenantByApiKey(apiKey: string) {
    for (const tenant of this.tenants.values()) {
      if (tenant.apiKey && tenant.apiKey === apiKey) return tenant;
    }
    return null;
  }

  async getLead(tenantId: string, phoneNumber: string) {
    const lead = this.leads.get(leadKey(tenantId, phoneNumber));
    return lead ? copyLead(lead) : null;
  }

  async createLead(tenantId: string, phoneNumber: string) {
    const existing = this.leads.get(leadKey(tenantId, phoneNumber));
    if (existing) return copyLead(existing);
    const lead: Lead = {
      id: crypto.randomUUID(),
      tenantId,
      phoneNumber,
      customerName: null,
      summary: null,
      currentFlowId: null,
      currentStepId: null,
      flowContext: {},
    };
    this.leads.set(leadKey(tenantId, phoneNumber), lead);
    return copyLead(lead);
  }

  async saveFlowState(lead: Lead) {
    const key = leadKey(lead.tenantId, lead.phoneNumber);
    const existing = this.leads.get(key);
    if (!existing) {
      this.leads.set(key, copyLead(lead));
      return;
    }
    existing.currentFlowId = lead.currentFlowId;
    existing.currentStepId = lead.currentStepId;
    existing.flowContext = { ...lead.flowContext };
  }

  async upsertLeadContact(input: LeadContactInput) {
    const key = leadKey(input.tenantId, input.phoneNumber);
    const existing = this.leads.get(key);
    if (existing) {
      if (input.customerName && !existing.customerName) {
        existing.customerName = input.customerName;
      }
      return copyLead(existing);
    }
    const created = await this.createLead(input.tenantId, input.phoneNumber);
    const lead: Lead = { ...created, customerName: input.customerName, summary: input.summary };
    this.leads.set(key, lead);
    return copyLead(lead);
  }

  async getFlow(flowId: string) {
    return this.flows.get(flowId) ?? null;
  }

  async listActiveTriggerFlows(tenantId: string) {
    return [...this.flows.values()].filter(
      (flow) => flow.tenantId === tenantId && flow.isActive && Boolean(flow.triggerKeyword?.trim())
    );
  }

  async listActiveRules(tenantId: string) {
    return this.rules.filter((rule) => rule.tenantId === tenantId && rule.isActive);
  }

  async listActiveQuickReplies(tenantId: string) {
    return this.quickReplies
      .filter((item) => item.tenantId === tenantId && item.isActive)
      .sort((a, b) => a.sortOrder - b.sortOrder);
  }

  async getQuickReply(quickReplyId: string) {
    return this.quickReplies.find((item) => item.id === quickReplyId) ?? null;
  }

  async listActiveKnowledge(tenantId: string) {
    return this.knowledge.filter((item) => item.tenantId === tenantId && item.isActive);
  }

  async getIntegrationByVerifyToken(verifyToken: string, channelTypes: ChannelType[]) {
    return (
      this.integrations.find(
        (item) => item.verifyToken === verifyToken && channelTypes.includes(item.channelType)
      ) ?? null
    );
  }

  async getIntegrationByExternalId(channelType: ChannelType, externalId: string) {
    return (
      this.integrations.find(
        (item) => item.channelType === channelType && item.externalId === externalId
      ) ?? null
    );
  }
}
