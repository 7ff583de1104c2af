/**
 * Signed session cookie
 *
 * Value format: `<steamId>.<expiresAtSeconds>.<hex hmac-sha256>`.
 * Uses Web Crypto so middleware (edge runtime) can verify it too.
 */

export const SESSION_COOKIE = "steam-session";
export const SESSION_MAX_AGE_SECONDS = 24 * 60 * 60;
export const DEV_SESSION_SECRET = "dev-secret-change-in-production";

export interface Session {
  steamId: string;
  expiresAt: number; // Unix timestamp
}

const encoder = new TextEncoder();

async function hmacHex(secret: string, payload: string): Promise<string> {
  const key = await crypto.subtle.importKey(
    "raw",
    encoder.encode(secret),
    { name: "HMAC", hash: "SHA-256" },
    false,
    ["sign"]
  );
  const signature = await crypto.subtle.sign("HMAC", key, encoder.encode(payload));
  return Array.from(new Uint8Array(signature), (byte) => byte.toString(16).padStart(2, "0")).join("");
}

function constantTimeEqual(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }
  return diff === 0;
}

export async function createSessionToken(
  steamId: string,
  secret: string,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): Promise<string> {
  const expiresAt = nowSeconds + SESSION_MAX_AGE_SECONDS;
  const payload = `${steamId}.${expiresAt}`;
  return `${payload}.${await hmacHex(secret, payload)}`;
}

/**
 * Returns the session, or null if the token is malformed, forged or expired
 */
export async function verifySessionToken(
  token: string | undefined,
  secret: string,
  nowSeconds: number = Math.floor(Date.now() / 1000)
): Promise<Session | null> {
  if (!token) {
    return null;
  }

  const parts = token.split(".");
  if (parts.length !== 3) {
    return null;
  }

  const [steamId, expires, signature] = parts;
  if (!/^\d{17}$/.test(steamId) || !/^\d+$/.test(expires)) {
    return null;
  }

  const expected = await hmacHex(secret, `${steamId}.${expires}`);
  if (!constantTimeEqual(signature, expected)) {
    return null;
  }

  const expiresAt = Number(expires);
  if (nowSeconds > expiresAt) {
    return null;
  }

  return { steamId, expiresAt };
}

export function sessionCookieOptions(secure: boolean) {
  return {
    httpOnly: true,
    secure,
    sameSite: "lax" as const,
    maxAge: SESSION_MAX_AGE_SECONDS,
    path: "/",
  };
}
