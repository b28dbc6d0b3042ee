import "express-session";
import type { AuthenticatedSession, PendingLogin } from "./types.js";

/**
 * Augment express-session to include our custom session fields.
 */
declare module "express-session" {
  interface SessionData {
    /** Set only by a successful callback, removed by logout */
    auth?: AuthenticatedSession;
    /** OIDC PKCE verifier and state (transient, used during login flow) */
    oidc?: PendingLogin;
  }
}
