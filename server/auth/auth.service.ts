import { Inject, Injectable, Logger } from "@nestjs/common";
import { APP_CONFIG } from "../config/config.js";
import type { AppConfig } from "../config/config.js";
import { MetricsService } from "../metrics/metrics.service.js";
import type { LandingLabel } from "../metrics/metrics.service.js";
import { decodeClaims, deriveRoles, identityFromClaims } from "./claims.js";
import {
  AuthFlowError,
  LoginStateMissingError,
  MissingTokensError,
  OAuthProviderError,
} from "./errors.js";
import { OidcClient } from "./oidc.js";
import type { AuthorizationRequest } from "./oidc.js";
import { landingRouteFor } from "./roles.js";
import type { LandingRoute } from "./roles.js";
import type { AuthenticatedSession, PendingLogin } from "./types.js";

export interface CompletedLogin {
  auth: AuthenticatedSession;
  landing: LandingRoute;
}

const LANDING_LABELS: Record<LandingRoute, LandingLabel> = {
  "/admin": "admin",
  "/user": "user",
  "/no-role": "no_role",
};

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(OidcClient) private readonly oidc: OidcClient,
    @Inject(MetricsService) private readonly metrics: MetricsService,
  ) {}

  /**
   * Build the OIDC authorization URL and the verifier/state the callback will need.
   */
  async beginLogin(): Promise<AuthorizationRequest> {
    return this.oidc.buildAuthorizationRequest();
  }

  /**
   * Turn the provider's callback into an authenticated session record.
   *
   * Nothing is written to the session here; the caller stores the returned
   * record in one assignment, so a failure at any step leaves no trace.
   */
  async completeLogin(
    callbackUrl: URL,
    pending: PendingLogin | undefined,
  ): Promise<CompletedLogin> {
    try {
      const providerError = callbackUrl.searchParams.get("error");
      if (providerError) {
        throw new OAuthProviderError(providerError);
      }
      if (!pending) {
        throw new LoginStateMissingError();
      }

      const tokens = await this.oidc.exchangeCode(callbackUrl, pending);
      const idToken = tokens.id_token;
      const accessToken = tokens.access_token;
      if (typeof idToken !== "string" || !idToken || typeof accessToken !== "string" || !accessToken) {
        throw new MissingTokensError(Object.keys(tokens));
      }

      // Claims are read without signature verification
      const identity = identityFromClaims(decodeClaims(idToken));
      const roles = deriveRoles(decodeClaims(accessToken), this.config.client.id);
      const landing = landingRouteFor(roles);

      return { auth: { identity, roles, idToken }, landing };
    } catch (err) {
      if (err instanceof AuthFlowError) {
        this.metrics.incLoginFailure(err.reason);
        this.logger.warn(`OIDC callback failed (${err.reason}): ${err.message}`);
      }
      throw err;
    }
  }

  /** Record a login once its session has been stored. */
  loginEstablished({ auth, landing }: CompletedLogin): void {
    this.metrics.incLogin(LANDING_LABELS[landing]);
    this.logger.log(`Login for ${auth.identity.subject} -> ${landing}`);
  }

  /**
   * Build the end-session URL for OIDC logout. The session must already be gone.
   */
  completeLogout(idTokenHint?: string): URL {
    this.metrics.incLogout();
    return this.oidc.buildEndSessionUrl(idTokenHint);
  }

  async isProviderReachable(): Promise<boolean> {
    return this.oidc.isReachable();
  }
}
