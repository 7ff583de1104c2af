/**
 * Steam OpenID 2.0 sign-in
 */

import { createLogger } from "../logger";
import { errorMessage } from "../errors";

const log = createLogger("openid");

const OPENID_NS = "http://specs.openid.net/auth/2.0";
const IDENTIFIER_SELECT = "http://specs.openid.net/auth/2.0/identifier_select";
const CLAIMED_ID_PATTERN = /^https:\/\/steamcommunity\.com\/openid\/id\/(\d{17})$/;

export type OpenIdResult = { ok: true; steamId: string } | { ok: false; error: string };

export function buildLoginUrl(providerUrl: string, returnTo: string, realm: string): string {
  const params = new URLSearchParams({
    "openid.ns": OPENID_NS,
    "openid.mode": "checkid_setup",
    "openid.return_to": returnTo,
    "openid.realm": realm,
    "openid.identity": IDENTIFIER_SELECT,
    "openid.claimed_id": IDENTIFIER_SELECT,
  });
  return `${providerUrl}?${params.toString()}`;
}

export function extractSteamId(claimedId: string): string | null {
  const match = claimedId.match(CLAIMED_ID_PATTERN);
  return match ? match[1] : null;
}

/**
 * Ask the provider to confirm the assertion it redirected back with
 */
async function checkAuthentication(providerUrl: string, params: URLSearchParams): Promise<boolean> {
  const body = new URLSearchParams(params);
  body.set("openid.mode", "check_authentication");

  try {
    const response = await fetch(providerUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body,
      signal: AbortSignal.timeout(10_000),
    });

    if (!response.ok) {
      log.warn(`check_authentication returned ${response.status}`);
      return false;
    }

    const text = await response.text();
    return /is_valid\s*:\s*true/.test(text);
  } catch (error) {
    log.error("OpenID validation failed", { error: errorMessage(error) });
    return false;
  }
}

/**
 * Validate the callback query string and return the signed-in Steam ID
 */
export async function verifyCallback(providerUrl: string, params: URLSearchParams): Promise<OpenIdResult> {
  const mode = params.get("openid.mode");
  if (mode === "cancel") {
    return { ok: false, error: "Login canceled" };
  }
  if (mode !== "id_res") {
    return { ok: false, error: "Invalid OpenID response" };
  }

  const claimedId = params.get("openid.claimed_id");
  if (!claimedId) {
    return { ok: false, error: "No claimed_id in response" };
  }

  const steamId = extractSteamId(claimedId);
  if (!steamId) {
    return { ok: false, error: "Failed to extract Steam ID" };
  }

  if (!(await checkAuthentication(providerUrl, params))) {
    return { ok: false, error: "Invalid OpenID response" };
  }

  return { ok: true, steamId };
}
