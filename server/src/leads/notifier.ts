import axios, { type AxiosAdapter } from "axios";
import { formatUnknownError } from "../shared/errors.js";

export type LeadWebhookPayload = {
  lead_id: string;
  tenant_id: string;
  customer_name: string | null;
  phone_number: string;
  summary: string | null;
  source_message: string;
};

export type LeadNotifier = {
  /** Resolves to whether the tenant endpoint accepted the payload. Never rejects. */
  notify: (webhookUrl: string | null | undefined, payload: LeadWebhookPayload) => Promise<boolean>;
};

export const createLeadNotifier = (deps: {
  timeoutMs: number;
  adapter?: AxiosAdapter;
}): LeadNotifier => {
  const http = axios.create({
    timeout: deps.timeoutMs,
    headers: { "Content-Type": "application/json" },
    ...(deps.adapter ? { adapter: deps.adapter } : {}),
  });

  const notify = async (webhookUrl: string | null | undefined, payload: LeadWebhookPayload) => {
    const url = webhookUrl?.trim();
    if (!url) return false;
    try {
      await http.post(url, payload);
      return true;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      console.warn(
        `Lead webhook for tenant ${payload.tenant_id} failed${status ? ` (${status})` : ""}:`,
        formatUnknownError(error)
      );
      return false;
    }
  };

  return { notify };
};
