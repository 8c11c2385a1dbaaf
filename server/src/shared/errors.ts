export type ExternalApiErrorKind =
  | "unauthorized"
  | "rate_limited"
  | "unavailable"
  | "bad_request"
  | "other";

export class AppError extends Error {
  userMessage: string;

  constructor(message: string, userMessage?: string) {
    super(message);
    this.name = new.target.name;
    this.userMessage = userMessage ?? "Something went wrong.";
  }
}

export class ExternalApiError extends AppError {
  kind: ExternalApiErrorKind;
  status?: number;
  body?: string;

  constructor(
    kind: ExternalApiErrorKind,
    message: string,
    options: { status?: number; body?: string; userMessage?: string } = {}
  ) {
    super(message, options.userMessage);
    this.kind = kind;
    this.status = options.status;
    this.body = options.body;
  }
}

export class TimeoutError extends AppError {}

export class ConfigurationError extends AppError {}

/** A flow or node reference that no longer resolves. Never fatal. */
export class FlowStateError extends AppError {
  flowId?: string;
  nodeId?: string;

  constructor(message: string, refs: { flowId?: string; nodeId?: string } = {}) {
    super(message);
    this.flowId = refs.flowId;
    this.nodeId = refs.nodeId;
  }
}

export const externalErrorKindForStatus = (status?: number): ExternalApiErrorKind => {
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 429) return "rate_limited";
  if (status === 503) return "unavailable";
  if (status === 400) return "bad_request";
  return "other";
};

export const formatUnknownError = (error: unknown) => {
  if (error instanceof Error) return error.message;
  if (
    typeof error === "object" &&
    error &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  if (typeof error === "string" && error.trim()) return error.trim();
  try {
    return JSON.stringify(error);
  } catch {
    return "Unknown error";
  }
};
