// ──────────────────────────────────────────────
// Scrubline - API Response Types
// ──────────────────────────────────────────────

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_DATASET"
  | "QUOTA_EXCEEDED"
  | "RATE_LIMITED"
  | "PAYLOAD_TOO_LARGE"
  | "BAD_REQUEST"
  | "INTERNAL_ERROR";

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: ApiErrorCode;
    message: string;
    details?: unknown;
  };
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;
