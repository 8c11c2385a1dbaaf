import axios, { type AxiosAdapter } from "axios";
import type { z } from "zod";
import type { ChannelType } from "../shared/types.js";
import {
  AppError,
  ExternalApiError,
  TimeoutError,
  externalErrorKindForStatus,
} from "../shared/errors.js";

export const TELEGRAM_API_BASE_URL = "https://api.telegram.org";
export const TELEGRAM_TIMEOUT_MS = 15_000;
export const META_TIMEOUT_MS = 20_000;

export const graphApiBaseUrl = (graphVersion: string) =>
  `https://graph.facebook.com/${graphVersion}`;

export const createChannelHttp = (options: {
  baseURL: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}) =>
  axios.create({
    baseURL: options.baseURL,
    headers: { "Content-Type": "application/json" },
    timeout: options.timeoutMs,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

export const mapChannelError = (channel: ChannelType, error: unknown): AppError => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return new TimeoutError(`${channel} send timed out: ${error.message}`);
      }
      return new AppError(`${channel} send failed: ${error.message}`);
    }
    const data: unknown = error.response?.data;
    return new ExternalApiError(externalErrorKindForStatus(status), `${channel} send failed (${status})`, {
      status,
      body: typeof data === "string" ? data : JSON.stringify(data ?? ""),
    });
  }
  if (error instanceof AppError) return error;
  return new AppError(error instanceof Error ? error.message : `${channel} send failed`);
};

/**
 * Parses every element on its own so that one malformed item in a webhook
 * batch does not hide the others.
 */
export const parseItems = <T extends z.ZodTypeAny>(
  schema: T,
  items: unknown[] | null | undefined
): Array<z.output<T>> => {
  const parsed: Array<z.output<T>> = [];
  for (const item of items ?? []) {
    const result = schema.safeParse(item);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
};

export const idToString = (value: string | number | null | undefined) =>
  value === null || value === undefined ? "" : String(value).trim();
