export type ProvisionErrorKind = "usage" | "config" | "permission" | "asset" | "runtime";

export class ProvisionError extends Error {
  constructor(message: string, readonly kind: ProvisionErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisionError";
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if (!("code" in error)) {
    return undefined;
  }
  const value = error.code;
  return typeof value === "string" ? value : undefined;
}

const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);

export function isPermissionError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && PERMISSION_CODES.has(code);
}
