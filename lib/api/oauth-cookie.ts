import type { NextResponse } from "next/server";
import { OAUTH_STATE_TTL_MINUTES, serializeAuthorizationRequest } from "../connections/oauth-state.ts";
import type { AuthorizationRequest, Platform } from "../types.ts";

const COOKIE_PATH = "/api/connections";

export function pendingOAuthCookieName(platform: Platform) {
  return `spp_oauth_${platform}`;
}

export function setPendingOAuthCookie(response: NextResponse, request: AuthorizationRequest) {
  response.cookies.set(pendingOAuthCookieName(request.platform), serializeAuthorizationRequest(request), {
    httpOnly: true,
    sameSite: "lax",
    secure: process.env.NODE_ENV === "production",
    path: COOKIE_PATH,
    maxAge: OAUTH_STATE_TTL_MINUTES * 60
  });
}

export function clearPendingOAuthCookie(response: NextResponse, platform: Platform) {
  response.cookies.delete({ name: pendingOAuthCookieName(platform), path: COOKIE_PATH });
}
