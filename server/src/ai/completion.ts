import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import type { LlmConfig } from "../config.js";
import {
  AppError,
  ConfigurationError,
  ExternalApiError,
  TimeoutError,
  externalErrorKindForStatus,
} from "../shared/errors.js";

export const COMPLETION_MESSAGES = {
  notConfigured: "AI is not configured for this tenant yet.",
  invalidKey: "AI error: invalid API key.",
  rateLimited: "AI is busy right now (rate limited). Please try again shortly.",
  unavailable: "AI service is temporarily unavailable. Please try again later.",
  timeout: "AI request timed out. Please try again.",
  unexpected: "Sorry, an unexpected error occurred while generating a response.",
  emptyResponse: "Sorry, I had trouble generating a response.",
} as const;

/** Checked in order when the configured model is rejected. */
export const FALLBACK_MODEL_PREFERENCE = [
  "llama-3.3-70b-versatile",
  "llama-3.1-8b-instant",
  "llama3-70b-8192",
  "mixtral-8x7b-32768",
  "gemma2-9b-it",
] as const;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .min(1),
});

const ModelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

export type CompletionInput = {
  systemPrompt: string;
  userMessage: string;
};

export type CompletionClient = {
  complete: (input: CompletionInput) => Promise<string>;
  completeJson: (input: CompletionInput) => Promise<string | null>;
  isConfigured: () => boolean;
};

export const createCompletionHttp = (config: LlmConfig, adapter?: AxiosAdapter): AxiosInstance =>
  axios.create({
    baseURL: config.baseUrl,
    headers: {
      Authorization: `Bearer ${config.apiKey ?? ""}`,
      "Content-Type": "application/json",
    },
    timeout: config.completionTimeoutMs,
    ...(adapter ? { adapter } : {}),
  });

const stringifyBody = (data: unknown) => {
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data ?? "");
  } catch {
    return "";
  }
};

const isTimeoutCode = (code?: string) => code === "ECONNABORTED" || code === "ETIMEDOUT";

export const mapCompletionError = (error: unknown): AppError => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      if (isTimeoutCode(error.code)) {
        return new TimeoutError(error.message, COMPLETION_MESSAGES.timeout);
      }
      return new AppError(error.message, COMPLETION_MESSAGES.unexpected);
    }

    const kind = externalErrorKindForStatus(status);
    const body = stringifyBody(error.response?.data);
    const userMessage =
      status === 401
        ? COMPLETION_MESSAGES.invalidKey
        : status === 429
          ? COMPLETION_MESSAGES.rateLimited
          : status === 503
            ? COMPLETION_MESSAGES.unavailable
            : `AI error ${status}`;

    return new ExternalApiError(kind, error.message, { status, body, userMessage });
  }

  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(error.message, COMPLETION_MESSAGES.unexpected);
  return new AppError("Unknown error", COMPLETION_MESSAGES.unexpected);
};

export const isModelRejection = (error: AppError) => {
  if (!(error instanceof ExternalApiError) || error.status !== 400) return false;
  const body = (error.body ?? "").toLowerCase();
  return body.includes("model") || body.includes("not found");
};

export const chooseFallbackModel = (available: string[], rejectedModel: string) => {
  const candidates = available.filter((id) => id && id !== rejectedModel);
  const preferred = FALLBACK_MODEL_PREFERENCE.find((id) => candidates.includes(id));
  return preferred ?? candidates[0] ?? null;
};

/**
 * Client for an OpenAI-compatible `/chat/completions` endpoint. `complete`
 * always resolves to text that can be shown to the end user.
 */
export const createCompletionClient = (deps: {
  config: LlmConfig;
  adapter?: AxiosAdapter;
}): CompletionClient => {
  const { config } = deps;
  const http = createCompletionHttp(config, deps.adapter);

  const requestCompletion = async (
    model: string,
    input: CompletionInput,
    options: { temperature: number; maxTokens: number; timeoutMs: number }
  ) => {
    const response = await http.post(
      "/chat/completions",
      {
        model,
        messages: [
          { role: "system", content: input.systemPrompt },
          { role: "user", content: input.userMessage },
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      },
      { timeout: options.timeoutMs }
    );
    const parsed = ChatCompletionSchema.safeParse(response.data);
    if (!parsed.success) return null;
    return parsed.data.choices[0]?.message?.content ?? null;
  };

  const listModels = async () => {
    const response = await http.get("/models", { timeout: config.modelListTimeoutMs });
    const parsed = ModelListSchema.safeParse(response.data);
    return parsed.success ? parsed.data.data.map((item) => item.id) : [];
  };

  const discoverFallbackModel = async (rejectedModel: string) => {
    try {
      return chooseFallbackModel(await listModels(), rejectedModel);
    } catch (error) {
      console.warn("Model list lookup failed:", mapCompletionError(error).message);
      return null;
    }
  };

  const completionOptions = {
    temperature: 0.3,
    maxTokens: 1024,
    timeoutMs: config.completionTimeoutMs,
  };

  const complete = async (input: CompletionInput) => {
    if (!config.apiKey) {
      return new ConfigurationError("LLM API key missing", COMPLETION_MESSAGES.notConfigured)
        .userMessage;
    }

    try {
      const content = await requestCompletion(config.model, input, completionOptions);
      return content?.trim() ? content : COMPLETION_MESSAGES.emptyResponse;
    } catch (error) {
      let failure = mapCompletionError(error);

      if (isModelRejection(failure)) {
        const fallbackModel = await discoverFallbackModel(config.model);
        if (fallbackModel) {
          console.warn(`Model '${config.model}' rejected, retrying once with '${fallbackModel}'.`);
          try {
            const content = await requestCompletion(fallbackModel, input, completionOptions);
            return content?.trim() ? content : COMPLETION_MESSAGES.emptyResponse;
          } catch (retryError) {
            failure = mapCompletionError(retryError);
          }
        }
      }

      console.error(`AI completion failed (${failure.name}):`, failure.message);
      return failure.userMessage;
    }
  };

  const completeJson = async (input: CompletionInput) => {
    if (!config.apiKey) return null;
    try {
      return await requestCompletion(config.model, input, {
        temperature: 0,
        maxTokens: 256,
        timeoutMs: config.extractionTimeoutMs,
      });
    } catch (error) {
      console.warn("AI extraction failed:", mapCompletionError(error).message);
      return null;
    }
  };

  return { complete, completeJson, isConfigured: () => Boolean(config.apiKey) };
};
