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

export type LeadContactInput = {
  tenantId: string;
  phoneNumber: string;
  customerName: string | null;
  summary: string | null;
};

/**
 * What the conversation core needs from storage. CRUD for tenants, rules,
 * quick replies and integrations lives outside this service.
 */
export interface ChatStore {
  getTenant(tenantId: string): Promise<Tenant | null>;
  getTenantByApiKey(apiKey: string): Promise<Tenant | null>;

  getLead(tenantId: string, phoneNumber: string): Promise<Lead | null>;
  createLead(tenantId: string, phoneNumber: string): Promise<Lead>;
  /** Writes only the flow columns; contact fields belong to lead capture. */
  saveFlowState(lead: Lead): Promise<void>;
  /** Insert, or backfill `customerName` on an existing lead that has none. */
  upsertLeadContact(input: LeadContactInput): Promise<Lead>;

  getFlow(flowId: string): Promise<FlowRecord | null>;
  listActiveTriggerFlows(tenantId: string): Promise<FlowRecord[]>;

  listActiveRules(tenantId: string): Promise<ScriptedResponse[]>;
  listActiveQuickReplies(tenantId: string): Promise<QuickReply[]>;
  getQuickReply(quickReplyId: string): Promise<QuickReply | null>;
  listActiveKnowledge(tenantId: string): Promise<KnowledgeItem[]>;

  getIntegrationByVerifyToken(
    verifyToken: string,
    channelTypes: ChannelType[]
  ): Promise<ChannelIntegration | null>;
  getIntegrationByExternalId(
    channelType: ChannelType,
    externalId: string
  ): Promise<ChannelIntegration | null>;
}
