import type { NextRequest } from "next/server";
import { NextResponse } from "next/server";
import { parseCorsOrigins } from "@/lib/cors";

/** Paths served as JSON API (dashboards on other origins call these) */
const API_PREFIXES = ["/health", "/rooms", "/analytics", "/admin/load_csv", "/api/"];

function isApiPath(pathname: string) {
  return API_PREFIXES.some((p) => pathname === p || pathname.startsWith(p.endsWith("/") ? p : `${p}/`));
}

function withCors(req: NextRequest, res: NextResponse) {
  const origin = req.headers.get("origin");
  if (origin && parseCorsOrigins(process.env.CORS_ORIGINS).includes(origin)) {
    res.headers.set("Access-Control-Allow-Origin", origin);
    res.headers.set("Access-Control-Allow-Credentials", "true");
    res.headers.set("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.headers.set("Access-Control-Allow-Headers", "Content-Type");
    res.headers.set("Vary", "Origin");
  }
  return res;
}

function withSecurityHeaders(res: NextResponse) {
  res.headers.set("X-Frame-Options", "DENY");
  res.headers.set("X-Content-Type-Options", "nosniff");
  res.headers.set("Referrer-Policy", "strict-origin-when-cross-origin");
  res.headers.set("Permissions-Policy", "camera=(), microphone=(), geolocation=(self)");
  res.headers.set(
    "Content-Security-Policy",
    [
      "default-src 'self'",
      "script-src 'self' 'unsafe-inline'",
      "style-src 'self' 'unsafe-inline'",
      "img-src 'self' data: blob:",
      "font-src 'self' data:",
      "connect-src 'self'",
      "frame-ancestors 'none'",
      "base-uri 'self'",
      "form-action 'self'",
    ].join("; ")
  );
  return res;
}

export function middleware(req: NextRequest) {
  const { pathname } = req.nextUrl;

  if (!isApiPath(pathname)) return withSecurityHeaders(NextResponse.next());

  // CORS preflight
  if (req.method === "OPTIONS") {
    return withSecurityHeaders(withCors(req, new NextResponse(null, { status: 204 })));
  }
  return withSecurityHeaders(withCors(req, NextResponse.next()));
}

export const config = {
  matcher: [
    "/((?!_next/static|_next/image|favicon\\.ico|.*\\.(?:svg|png|jpg|jpeg|gif|webp|ico)$).*)",
  ],
};
