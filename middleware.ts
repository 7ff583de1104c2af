import { NextResponse } from "next/server";
import type { NextRequest } from "next/server";
import { DEV_SESSION_SECRET, SESSION_COOKIE, verifySessionToken } from "./src/lib/auth/session";

// Sign-in flow, health probe and admin routes (bearer token) skip the session check
const OPEN_PREFIXES = ["/api/auth/", "/api/admin/"];

function needsSession(pathname: string): boolean {
  if (pathname === "/" || pathname === "/api/health") {
    return false;
  }
  return !OPEN_PREFIXES.some((prefix) => pathname.startsWith(prefix));
}

export async function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;
  if (!needsSession(pathname)) {
    return NextResponse.next();
  }

  const session = await verifySessionToken(
    request.cookies.get(SESSION_COOKIE)?.value,
    process.env.SESSION_SECRET ?? DEV_SESSION_SECRET
  );
  if (session) {
    return NextResponse.next();
  }

  return pathname.startsWith("/api/")
    ? NextResponse.json({ success: false, error: "Not authenticated" }, { status: 401 })
    : NextResponse.redirect(new URL("/", request.url));
}

export const config = {
  // Skip Next.js assets and static images
  matcher: ["/((?!_next/static|_next/image|favicon.ico|.*\\.(?:svg|png|jpg|jpeg|gif|webp)$).*)"],
};
