export type GatewayErrorCode =
  | "MISSING_IDENTITY"
  | "INVALID_REQUEST"
  | "AUTH_REJECTED"
  | "RATE_LIMITED"
  | "UPSTREAM_FAILURE"
  | "IMAGE_GENERATION_EXHAUSTED"
  | "ATTACHMENT_STAGING"
  | "PROXY_FETCH";

export type GatewayErrorStatus = 400 | 401 | 429 | 500;

export const STATUS_BY_CODE: Record<GatewayErrorCode, GatewayErrorStatus> = {
  MISSING_IDENTITY: 400,
  INVALID_REQUEST: 400,
  AUTH_REJECTED: 401,
  RATE_LIMITED: 429,
  UPSTREAM_FAILURE: 500,
  IMAGE_GENERATION_EXHAUSTED: 500,
  ATTACHMENT_STAGING: 500,
  PROXY_FETCH: 500,
};

export class GatewayError extends Error {
  constructor(
    public readonly code: GatewayErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "GatewayError";
  }

  get status(): GatewayErrorStatus {
    return STATUS_BY_CODE[this.code];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
