/* packages/server/core/src/errors.ts */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "PAYLOAD_TOO_LARGE"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "CAPACITY_EXCEEDED"
  | "INVARIANT_VIOLATION"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR";

export const DEFAULT_STATUS: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  CAPACITY_EXCEEDED: 507,
  INVARIANT_VIOLATION: 500,
  CONFIG_ERROR: 500,
  INTERNAL_ERROR: 500,
};

export interface ErrorEnvelope {
  ok: false;
  error: {
    code: ErrorCode;
    message: string;
  };
}

export class BoardError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string, status?: number) {
    super(message);
    this.code = code;
    this.status = status ?? DEFAULT_STATUS[code];
    this.name = "BoardError";
  }

  toJSON(): ErrorEnvelope {
    return {
      ok: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}
