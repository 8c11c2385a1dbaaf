import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { parseFlowDefinition } from "../flows/validation.js";
import type { FlowRecord } from "../flows/types.js";
import { AppError } from "../shared/errors.js";
import { CHANNEL_TYPES } from "../shared/types.js";
import type {
  ChannelIntegration,
  ChannelType,
  KnowledgeItem,
  Lead,
  QuickReply,
  ScriptedResponse,
  Tenant,
} from "../shared/types.js";
import type { ChatStore, LeadContactInput } from "./types.js";

export const createSupabaseClient = (config: NonNullable<AppConfig["supabase"]>) =>
  createClient(config.url, config.serviceKey, {
    auth: { persistSession: false },
  });

const Id = z.union([z.string(), z.number()]).transform(String);
const NullableId = z.union([z.string(), z.number()]).nullish().transform((value) =>
  value === null || value === undefined ? null : String(value)
);
const NullableText = z.string().nullish().transform((value) => value ?? null);

const TenantRow = z.object({
  id: Id,
  name: z.string().nullish().transform((value) => value ?? ""),
  api_key: NullableText,
  system_prompt: NullableText,
  webhook_url: NullableText,
});

const LeadRow = z.object({
  id: Id,
  tenant_id: Id,
  phone_number: z.string(),
  customer_name: NullableText,
  summary: NullableText,
  current_flow_id: NullableId,
  current_step_id: NullableId,
  flow_context: z
    .record(z.union([z.string(), z.number(), z.boolean()]).transform(String))
    .nullish()
    .catch(null),
});

const FlowRow = z.object({
  id: Id,
  tenant_id: Id,
  name: z.string().nullish().transform((value) => value ?? ""),
  trigger_keyword: NullableText,
  is_active: z.boolean(),
  flow_data: z.unknown(),
});

const RuleRow = z.object({
  id: Id,
  tenant_id: Id,
  trigger_keyword: z.string().nullish().transform((value) => value ?? ""),
  response_text: z.string(),
  is_active: z.boolean(),
});

const QuickReplyRow = z.object({
  id: Id,
  tenant_id: Id,
  title: z.string(),
  payload_text: z.string(),
  sort_order: z.number().nullish().transform((value) => value ?? 0),
  is_active: z.boolean(),
});

const KnowledgeRow = z.object({
  id: Id,
  tenant_id: Id,
  title: z.string(),
  content: z.string(),
  is_active: z.boolean(),
});

const IntegrationRow = z.object({
  id: Id,
  tenant_id: Id,
  channel_type: z.enum(CHANNEL_TYPES),
  external_id: NullableId,
  access_token: NullableText,
  verify_token: z.string(),
  is_active: z.boolean(),
});

const TENANT_COLUMNS = "id, name, api_key, system_prompt, webhook_url";
const LEAD_COLUMNS =
  "id, tenant_id, phone_number, customer_name, summary, current_flow_id, current_step_id, flow_context";
const FLOW_COLUMNS = "id, tenant_id, name, trigger_keyword, is_active, flow_data";
const RULE_COLUMNS = "id, tenant_id, trigger_keyword, response_text, is_active";
const QUICK_REPLY_COLUMNS = "id, tenant_id, title, payload_text, sort_order, is_active";
const KNOWLEDGE_COLUMNS = "id, tenant_id, title, content, is_active";
const INTEGRATION_COLUMNS =
  "id, tenant_id, channel_type, external_id, access_token, verify_token, is_active";

const UNIQUE_VIOLATION = "23505";

export const toTenant = (row: z.infer<typeof TenantRow>): Tenant => ({
  id: row.id,
  name: row.name,
  apiKey: row.api_key,
  systemPrompt: row.system_prompt,
  webhookUrl: row.webhook_url,
});

export const toLead = (row: z.infer<typeof LeadRow>): Lead => {
  const waiting = row.current_flow_id !== null && row.current_step_id !== null;
  return {
    id: row.id,
    tenantId: row.tenant_id,
    phoneNumber: row.phone_number,
    customerName: row.customer_name,
    summary: row.summary,
    currentFlowId: waiting ? row.current_flow_id : null,
    currentStepId: waiting ? row.current_step_id : null,
    flowContext: row.flow_context ?? {},
  };
};

export const toFlow = (row: z.infer<typeof FlowRow>): FlowRecord => ({
  id: row.id,
  tenantId: row.tenant_id,
  name: row.name,
  triggerKeyword: row.trigger_keyword,
  isActive: row.is_active,
  definition: parseFlowDefinition(row.flow_data),
});

const toRule = (row: z.infer<typeof RuleRow>): ScriptedResponse => ({
  id: row.id,
  tenantId: row.tenant_id,
  triggerKeyword: row.trigger_keyword,
  responseText: row.response_text,
  isActive: row.is_active,
});

const toQuickReply = (row: z.infer<typeof QuickReplyRow>): QuickReply => ({
  id: row.id,
  tenantId: row.tenant_id,
  title: row.title,
  payloadText: row.payload_text,
  sortOrder: row.sort_order,
  isActive: row.is_active,
});

const toKnowledge = (row: z.infer<typeof KnowledgeRow>): KnowledgeItem => ({
  id: row.id,
  tenantId: row.tenant_id,
  title: row.title,
  content: row.content,
  isActive: row.is_active,
});

const toIntegration = (row: z.infer<typeof IntegrationRow>): ChannelIntegration => ({
  id: row.id,
  tenantId: row.tenant_id,
  channelType: row.channel_type,
  externalId: row.external_id,
  accessToken: row.access_token,
  verifyToken: row.verify_token,
  isActive: row.is_active,
});

const PostgrestErrorShape = z.object({
  message: z.string(),
  code: z.string().nullish(),
});

export class StoreError extends AppError {
  table: string;
  code?: string;

  constructor(table: string, message: string, code?: string) {
    super(`${table}: ${message}`, "Storage is unavailable right now.");
    this.table = table;
    this.code = code;
  }
}

const mapStoreError = (table: string, error: unknown) => {
  const parsed = PostgrestErrorShape.safeParse(error);
  if (!parsed.success) return new StoreError(table, "unknown storage error");
  const { message, code } = parsed.data;
  if (message.includes(`relation "public.${table}" does not exist`) || message.includes(`relation "${table}" does not exist`)) {
    return new StoreError(table, "table is missing; run server/supabase/schema.sql first.", code ?? undefined);
  }
  return new StoreError(table, message, code ?? undefined);
};

const parseRows = <T extends z.ZodTypeAny>(table: string, schema: T, data: unknown): Array<z.output<T>> => {
  const rows = z.array(z.unknown()).safeParse(data);
  if (!rows.success) return [];
  const parsed: Array<z.output<T>> = [];
  for (const row of rows.data) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      console.warn(`Skipping malformed ${table} row:`, result.error.issues[0]?.message ?? "invalid");
    }
  }
  return parsed;
};

const parseRow = <T extends z.ZodTypeAny>(table: string, schema: T, data: unknown): z.output<T> | null =>
  data === null || data === undefined ? null : parseRows(table, schema, [data])[0] ?? null;

/**
 * `ChatStore` over Supabase tables. Rows are validated on the way in; a row
 * that does not parse is skipped with a warning.
 */
export class SupabaseChatStore implements ChatStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getTenant(tenantId: string) {
    const { data, error } = await this.supabase
      .from("tenants")
      .select(TENANT_COLUMNS)
      .eq("id", tenantId)
      .maybeSingle();
    if (error) throw mapStoreError("tenants", error);
    const row = parseRow("tenants", TenantRow, data);
    return row ? toTenant(row) : null;
  }

  async getTenantByApiKey(apiKey: string) {
    const { data, error } = await this.supabase
      .from("tenants")
      .select(TENANT_COLUMNS)
      .eq("api_key", apiKey)
      .maybeSingle();
    if (error) throw mapStoreError("tenants", error);
    const row = parseRow("tenants", TenantRow, data);
    return row ? toTenant(row) : null;
  }

  async getLead(tenantId: string, phoneNumber: string) {
    const { data, error } = await this.supabase
      .from("leads")
      .select(LEAD_COLUMNS)
      .eq("tenant_id", tenantId)
      .eq("phone_number", phoneNumber)
      .maybeSingle();
    if (error) throw mapStoreError("leads", error);
    const row = parseRow("leads", LeadRow, data);
    return row ? toLead(row) : null;
  }

  private async insertLead(values: {
    tenant_id: string;
    phone_number: string;
    customer_name: string | null;
    summary: string | null;
  }): Promise<Lead | null> {
    const { data, error } = await this.supabase
      .from("leads")
      .insert({ ...values, flow_context: {} })
      .select(LEAD_COLUMNS)
      .single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) return null;
      throw mapStoreError("leads", error);
    }
    const row = parseRow("leads", LeadRow, data);
    if (!row) throw new StoreError("leads", "insert returned no row");
    return toLead(row);
  }

  async createLead(tenantId: string, phoneNumber: string) {
    const created = await this.insertLead({
      tenant_id: tenantId,
      phone_number: phoneNumber,
      customer_name: null,
      summary: null,
    });
    if (created) return created;
    // Another request created it first.
    const existing = await this.getLead(tenantId, phoneNumber);
    if (!existing) throw new StoreError("leads", "lead vanished after a duplicate insert");
    return existing;
  }

  async saveFlowState(lead: Lead) {
    const { error } = await this.supabase
      .from("leads")
      .update({
        current_flow_id: lead.currentFlowId,
        current_step_id: lead.currentStepId,
        flow_context: lead.flowContext,
      })
      .eq("id", lead.id);
    if (error) throw mapStoreError("leads", error);
  }

  private async backfillName(lead: Lead, customerName: string | null) {
    if (!customerName || lead.customerName) return lead;
    const { error } = await this.supabase
      .from("leads")
      .update({ customer_name: customerName })
      .eq("id", lead.id);
    if (error) throw mapStoreError("leads", error);
    return { ...lead, customerName };
  }

  async upsertLeadContact(input: LeadContactInput) {
    const existing = await this.getLead(input.tenantId, input.phoneNumber);
    if (existing) return this.backfillName(existing, input.customerName);

    const created = await this.insertLead({
      tenant_id: input.tenantId,
      phone_number: input.phoneNumber,
      customer_name: input.customerName,
      summary: input.summary,
    });
    if (created) return created;
    const raced = await this.getLead(input.tenantId, input.phoneNumber);
    if (!raced) throw new StoreError("leads", "lead vanished after a duplicate insert");
    return this.backfillName(raced, input.customerName);
  }

  async getFlow(flowId: string) {
    const { data, error } = await this.supabase
      .from("flows")
      .select(FLOW_COLUMNS)
      .eq("id", flowId)
      .maybeSingle();
    if (error) throw mapStoreError("flows", error);
    const row = parseRow("flows", FlowRow, data);
    return row ? toFlow(row) : null;
  }

  async listActiveTriggerFlows(tenantId: string) {
    const { data, error } = await this.supabase
      .from("flows")
      .select(FLOW_COLUMNS)
      .eq("tenant_id", tenantId)
      .eq("is_active", true)
      .not("trigger_keyword", "is", null)
      .order("id", { ascending: true });
    if (error) throw mapStoreError("flows", error);
    return parseRows("flows", FlowRow, data).map(toFlow);
  }

  async listActiveRules(tenantId: string) {
    const { data, error } = await this.supabase
      .from("scripted_responses")
      .select(RULE_COLUMNS)
      .eq("tenant_id", tenantId)
      .eq("is_active", true)
      .order("id", { ascending: true });
    if (error) throw mapStoreError("scripted_responses", error);
    return parseRows("scripted_responses", RuleRow, data).map(toRule);
  }

  async listActiveQuickReplies(tenantId: string) {
    const { data, error } = await this.supabase
      .from("quick_replies")
      .select(QUICK_REPLY_COLUMNS)
      .eq("tenant_id", tenantId)
      .eq("is_active", true)
      .order("sort_order", { ascending: true })
      .order("id", { ascending: true });
    if (error) throw mapStoreError("quick_replies", error);
    return parseRows("quick_replies", QuickReplyRow, data).map(toQuickReply);
  }

  async getQuickReply(quickReplyId: string) {
    const { data, error } = await this.supabase
      .from("quick_replies")
      .select(QUICK_REPLY_COLUMNS)
      .eq("id", quickReplyId)
      .maybeSingle();
    if (error) throw mapStoreError("quick_replies", error);
    const row = parseRow("quick_replies", QuickReplyRow, data);
    return row ? toQuickReply(row) : null;
  }

  async listActiveKnowledge(tenantId: string) {
    const { data, error } = await this.supabase
      .from("knowledge_base")
      .select(KNOWLEDGE_COLUMNS)
      .eq("tenant_id", tenantId)
      .eq("is_active", true)
      .order("created_at", { ascending: false });
    if (error) throw mapStoreError("knowledge_base", error);
    return parseRows("knowledge_base", KnowledgeRow, data).map(toKnowledge);
  }

  async getIntegrationByVerifyToken(verifyToken: string, channelTypes: ChannelType[]) {
    const { data, error } = await this.supabase
      .from("channel_integrations")
      .select(INTEGRATION_COLUMNS)
      .eq("verify_token", verifyToken)
      .in("channel_type", channelTypes)
      .maybeSingle();
    if (error) throw mapStoreError("channel_integrations", error);
    const row = parseRow("channel_integrations", IntegrationRow, data);
    return row ? toIntegration(row) : null;
  }

  async getIntegrationByExternalId(channelType: ChannelType, externalId: string) {
    const { data, error } = await this.supabase
      .from("channel_integrations")
      .select(INTEGRATION_COLUMNS)
      .eq("channel_type", channelType)
      .eq("external_id", externalId)
      .maybeSingle();
    if (error) throw mapStoreError("channel_integrations", error);
    const row = parseRow("channel_integrations", IntegrationRow, data);
    return row ? toIntegration(row) : null;
  }
}
