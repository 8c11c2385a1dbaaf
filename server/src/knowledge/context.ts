import type { KnowledgeItem, Tenant } from "../shared/types.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";
export const KNOWLEDGE_HEADER = "Knowledge base:";

export const buildKnowledgeContext = (items: KnowledgeItem[]) => {
  const active = items.filter((item) => item.isActive);
  if (active.length === 0) return "";
  const lines = active.map((item) => `- ${item.title.trim()}: ${item.content.trim()}`);
  return [KNOWLEDGE_HEADER, ...lines].join("\n\n");
};

export const buildSystemPrompt = (
  tenant: Pick<Tenant, "systemPrompt"> | null,
  knowledgeContext = ""
) => {
  const base = tenant?.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT;
  return knowledgeContext ? `${base}\n\n${knowledgeContext}` : base;
};
