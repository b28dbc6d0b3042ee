/** Who the provider says the user is, taken from ID token claims. */
export interface Identity {
  subject: string;
  email?: string;
  preferredUsername?: string;
}

/**
 * Authenticated part of the session. Identity, roles and the raw ID token are
 * one record so a session can never hold some of them without the others.
 */
export interface AuthenticatedSession {
  identity: Identity;
  /** Deduplicated, sorted ascending */
  roles: string[];
  /** Raw ID token, only used as the logout hint */
  idToken: string;
}

/** Transient state of a login attempt between /login and /callback. */
export interface PendingLogin {
  codeVerifier: string;
  state: string;
}

/** Fields returned by the token endpoint, as received. */
export type TokenResponse = Readonly<Record<string, unknown>>;
