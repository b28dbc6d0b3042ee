import { decodeJwt, type JWTPayload } from "jose";
import { InvalidTokenError } from "./errors.js";
import type { Identity } from "./types.js";

type Claims = Readonly<Record<string, unknown>>;

export function isRecord(value: unknown): value is Claims {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(source: unknown, key: string): unknown {
  return isRecord(source) ? source[key] : undefined;
}

function stringsIn(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Collect roles from the three places the provider may put them:
 *   - a top-level `roles` array (custom mapper)
 *   - `realm_access.roles` (realm roles)
 *   - `resource_access[clientId].roles` (roles of this client)
 *
 * Missing or oddly shaped claims contribute nothing. The result is
 * deduplicated and sorted so it is stable in the session.
 */
export function deriveRoles(claims: Claims, clientId: string): string[] {
  const roles = new Set<string>([
    ...stringsIn(claims.roles),
    ...stringsIn(field(claims.realm_access, "roles")),
    ...stringsIn(field(field(claims.resource_access, clientId), "roles")),
  ]);
  return [...roles].sort();
}

/**
 * Read a token's payload WITHOUT checking its signature.
 * TODO: verify against the realm JWKS and check iss/aud/exp before trusting roles.
 */
export function decodeClaims(token: string): JWTPayload {
  try {
    return decodeJwt(token);
  } catch (err) {
    throw new InvalidTokenError("Token is not a decodable JWT", err);
  }
}

export function identityFromClaims(claims: Claims): Identity {
  const subject = optionalString(claims.sub);
  if (!subject) {
    throw new InvalidTokenError("ID token has no subject");
  }
  return {
    subject,
    email: optionalString(claims.email),
    preferredUsername: optionalString(claims.preferred_username),
  };
}

/** Name to greet the user with: email, else preferred username. */
export function displayName(identity: Identity | undefined): string | undefined {
  return identity?.email ?? identity?.preferredUsername;
}
