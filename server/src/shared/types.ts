export const CHANNEL_TYPES = ["telegram", "whatsapp", "messenger", "instagram"] as const;

export type ChannelType = (typeof CHANNEL_TYPES)[number];

export type Tenant = {
  id: string;
  name: string;
  apiKey?: string | null;
  systemPrompt?: string | null;
  webhookUrl?: string | null;
};

export type FlowContext = Record<string, string>;

export type Lead = {
  id: string;
  tenantId: string;
  phoneNumber: string;
  customerName: string | null;
  summary: string | null;
  currentFlowId: string | null;
  currentStepId: string | null;
  flowContext: FlowContext;
};

export type ScriptedResponse = {
  id: string;
  tenantId: string;
  triggerKeyword: string;
  responseText: string;
  isActive: boolean;
};

export type QuickReply = {
  id: string;
  tenantId: string;
  title: string;
  payloadText: string;
  sortOrder: number;
  isActive: boolean;
};

export type KnowledgeItem = {
  id: string;
  tenantId: string;
  title: string;
  content: string;
  isActive: boolean;
};

export type ChannelIntegration = {
  id: string;
  tenantId: string;
  channelType: ChannelType;
  externalId: string | null;
  accessToken: string | null;
  verifyToken: string;
  isActive: boolean;
};

export type ReplySource = "flow" | "bot" | "ai";

export type ChatResult = {
  response: string;
  source: ReplySource;
};
