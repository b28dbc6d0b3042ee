import { HttpException, HttpStatus } from "@nestjs/common";

export type ErrorBody = {
  error: string;
  detail?: string;
};

export type LoginFailureReason =
  | "provider_error"
  | "missing_tokens"
  | "invalid_token"
  | "state_missing"
  | "rejected"
  | "provider_unavailable";

/**
 * Failure of the login flow. Terminal for the request; the session is left as it was.
 */
export abstract class AuthFlowError extends HttpException {
  abstract readonly reason: LoginFailureReason;

  protected constructor(body: ErrorBody, status: HttpStatus, cause?: unknown) {
    super(body, status, cause === undefined ? undefined : { cause });
  }
}

/** The provider answered the authorization or token request with an OAuth error. */
export class OAuthProviderError extends AuthFlowError {
  readonly reason = "provider_error";

  constructor(readonly code: string, cause?: unknown) {
    super({ error: "OAuth error", detail: code }, HttpStatus.BAD_REQUEST, cause);
  }
}

/** The token response lacks the ID token or the access token. */
export class MissingTokensError extends AuthFlowError {
  readonly reason = "missing_tokens";

  constructor(readonly returnedKeys: readonly string[]) {
    super(
      { error: "Expected tokens were not received", detail: `keys=${returnedKeys.join(",")}` },
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class InvalidTokenError extends AuthFlowError {
  readonly reason = "invalid_token";

  constructor(detail: string, cause?: unknown) {
    super({ error: "Invalid token", detail }, HttpStatus.BAD_REQUEST, cause);
  }
}

/** Callback arrived without the state stored by /login in this session. */
export class LoginStateMissingError extends AuthFlowError {
  readonly reason = "state_missing";

  constructor() {
    super(
      { error: "Missing OIDC session data. Please try logging in again." },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/** The callback or token response failed a client-side check (state mismatch, bad body). */
export class CallbackRejectedError extends AuthFlowError {
  readonly reason = "rejected";

  constructor(detail: string, cause?: unknown) {
    super({ error: "Authentication failed", detail }, HttpStatus.BAD_REQUEST, cause);
  }
}

export class ProviderUnavailableError extends AuthFlowError {
  readonly reason = "provider_unavailable";

  constructor(readonly timedOut: boolean, cause?: unknown) {
    super(
      { error: "Identity provider unavailable", detail: "Please try again later." },
      timedOut ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.BAD_GATEWAY,
      cause,
    );
  }
}

export class UnauthenticatedError extends HttpException {
  constructor() {
    super({ error: "Not authenticated" }, HttpStatus.UNAUTHORIZED);
  }
}

export class ForbiddenError extends HttpException {
  constructor() {
    super({ error: "Forbidden" }, HttpStatus.FORBIDDEN);
  }
}
