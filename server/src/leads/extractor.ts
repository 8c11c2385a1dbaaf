import { z } from "zod";
import type { CompletionClient } from "../ai/completion.js";
import type { ChatStore } from "../store/types.js";
import { formatUnknownError } from "../shared/errors.js";
import { findEmail } from "../shared/email.js";
import { findPhoneNumber, looksLikePhoneNumber } from "../shared/phone.js";
import type { LeadNotifier } from "./notifier.js";

export type LeadInfo = {
  phoneNumber: string;
  customerName: string | null;
};

const NAME_PATTERNS: RegExp[] = [
  /\bmy\s+name\s+is\s+([a-z][a-z\s\-']{1,60})\b/i,
  /\bi\s+am\s+([a-z][a-z\s\-']{1,60})\b/i,
  /\bi'm\s+([a-z][a-z\s\-']{1,60})\b/i,
  /\bthis\s+is\s+([a-z][a-z\s\-']{1,60})\b/i,
];

const EXTRACTION_PROMPT = [
  "You are an information extractor.",
  "Extract contact details from a chat message.",
  "Return ONLY valid JSON with keys: customer_name, phone_number.",
  "If unknown, use empty string.",
].join(" ");

const LlmExtractionSchema = z.object({
  customer_name: z.string().nullable().optional(),
  phone_number: z.union([z.string(), z.number()]).nullable().optional(),
});

export const toTitleCase = (value: string) =>
  value
    .split(/\s+/)
    .filter(Boolean)
    .join(" ")
    .replace(/[a-z]+/gi, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export const extractCustomerName = (message: string): string | null => {
  for (const pattern of NAME_PATTERNS) {
    const match = message.match(pattern);
    const candidate = match?.[1] ? toTitleCase(match[1]) : "";
    if (candidate) return candidate;
  }
  return null;
};

/** Regex-only extraction; a phone-number-shaped substring is required. */
export const extractLeadInfo = (message: string): LeadInfo | null => {
  const phoneNumber = findPhoneNumber(message);
  if (!phoneNumber) return null;
  return { phoneNumber, customerName: extractCustomerName(message) };
};

const stripCodeFence = (value: string) =>
  value
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();

export const parseLlmExtraction = (content: string | null): LeadInfo | null => {
  if (!content) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(content));
  } catch {
    return null;
  }
  const parsed = LlmExtractionSchema.safeParse(raw);
  if (!parsed.success) return null;
  const phoneNumber = String(parsed.data.phone_number ?? "").trim();
  if (!phoneNumber || !looksLikePhoneNumber(phoneNumber)) return null;
  const customerName = parsed.data.customer_name?.trim() || null;
  return { phoneNumber, customerName };
};

export const buildLeadSummary = (info: {
  customerName: string | null;
  phoneNumber: string;
  email: string | null;
}) => {
  const parts = [`phone=${info.phoneNumber}`];
  if (info.customerName) parts.unshift(`name=${info.customerName}`);
  if (info.email) parts.push(`email=${info.email}`);
  return `Captured lead: ${parts.join(", ")}`;
};

export type DetectLeadInput = {
  tenantId: string;
  userMessage: string;
  senderId?: string | null;
};

export type LeadExtractor = {
  extractLeadInfoWithLlm: (message: string) => Promise<LeadInfo | null>;
  /** Best effort; resolves to the stored lead id, or null when nothing was captured. */
  detectAndSaveLead: (input: DetectLeadInput) => Promise<string | null>;
};

export const createLeadExtractor = (deps: {
  store: ChatStore;
  completion: CompletionClient;
  notifier: LeadNotifier;
}): LeadExtractor => {
  const { store, completion, notifier } = deps;

  const extractLeadInfoWithLlm = async (message: string) => {
    if (!completion.isConfigured()) return null;
    const content = await completion.completeJson({
      systemPrompt: EXTRACTION_PROMPT,
      userMessage: `Message: ${message}`,
    });
    return parseLlmExtraction(content);
  };

  const detectAndSaveLead = async (input: DetectLeadInput) => {
    try {
      const info = extractLeadInfo(input.userMessage) ?? (await extractLeadInfoWithLlm(input.userMessage));

      const senderId = input.senderId?.trim();
      const phoneNumber = info?.phoneNumber || senderId;
      if (!phoneNumber) return null;
      const customerName = info?.customerName ?? null;

      const summary = buildLeadSummary({
        customerName,
        phoneNumber,
        email: findEmail(input.userMessage),
      });

      const lead = await store.upsertLeadContact({
        tenantId: input.tenantId,
        phoneNumber,
        customerName,
        summary,
      });

      const tenant = await store.getTenant(input.tenantId);
      await notifier.notify(tenant?.webhookUrl, {
        lead_id: lead.id,
        tenant_id: input.tenantId,
        customer_name: customerName,
        phone_number: phoneNumber,
        summary,
        source_message: input.userMessage,
      });
      return lead.id;
    } catch (error) {
      console.error(`Lead capture failed for tenant ${input.tenantId}:`, formatUnknownError(error));
      return null;
    }
  };

  return { extractLeadInfoWithLlm, detectAndSaveLead };
};
