import { createHash } from "node:crypto";
import type { IdentityTokens } from "./upstream/types.js";

export interface CookieNames {
  primary: string;
  secondary: string;
}

export const DEFAULT_COOKIE_NAMES: CookieNames = {
  primary: "__Secure-1PSID",
  secondary: "__Secure-1PSIDTS",
};

/**
 * Reads the caller's identity cookies from a raw `Cookie` header.
 * Returns null when the primary cookie is missing. A missing secondary cookie
 * is left undefined rather than defaulted.
 */
export function extractIdentity(
  header: string | undefined,
  names: CookieNames = DEFAULT_COOKIE_NAMES
): IdentityTokens | null {
  let primary: string | undefined;
  let secondary: string | undefined;

  // Prefixes include "=" so the secondary name never matches as the primary one.
  for (const raw of (header ?? "").split(";")) {
    const segment = raw.trim();
    if (segment.startsWith(`${names.primary}=`)) {
      primary = segment.slice(segment.indexOf("=") + 1);
    } else if (segment.startsWith(`${names.secondary}=`)) {
      secondary = segment.slice(segment.indexOf("=") + 1);
    }
  }

  if (!primary) return null;
  return secondary === undefined ? { primary } : { primary, secondary };
}

// An empty secondary token yields the same key as an absent one.
export function cacheKey(tokens: IdentityTokens): string {
  return `${tokens.primary}:${tokens.secondary ?? ""}`;
}

/** Short, non-reversible label for a cache key, safe to put in logs and limiter keys. */
export function fingerprint(tokens: IdentityTokens): string {
  return createHash("sha256").update(cacheKey(tokens)).digest("hex").slice(0, 12);
}
