import { timingSafeEqual } from "node:crypto";

export const ADMIN_API_KEY_HEADER = "x-admin-api-key";

export class AdminAuthError extends Error {
  code: string;
  status: number;

  constructor(code: "UNAUTHENTICATED" | "ADMIN_KEY_NOT_CONFIGURED", message: string, status: number) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

export type AdminAccess = { allowed: true } | { allowed: false; error: AdminAuthError };

export function checkAdminApiKey(
  request: Request,
  env: Record<string, string | undefined> = process.env
): AdminAccess {
  const expected = env.ADMIN_API_KEY;
  if (!expected) {
    return {
      allowed: false,
      error: new AdminAuthError("ADMIN_KEY_NOT_CONFIGURED", "Service misconfigured.", 503)
    };
  }

  const provided = request.headers.get(ADMIN_API_KEY_HEADER);
  if (!provided) {
    return { allowed: false, error: new AdminAuthError("UNAUTHENTICATED", "Authentication is required.", 401) };
  }

  const left = Buffer.from(provided, "utf8");
  const right = Buffer.from(expected, "utf8");
  if (left.length !== right.length || !timingSafeEqual(left, right)) {
    return { allowed: false, error: new AdminAuthError("UNAUTHENTICATED", "Authentication is required.", 401) };
  }

  return { allowed: true };
}
