/**
 * Keycloak OIDC integration using openid-client v6.
 *
 * Endpoints are built from configuration instead of discovery: the browser
 * and this server may reach the provider under different hosts (container
 * networking), so the authorize and logout endpoints use the browser base
 * while the token endpoint uses the backend base.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { Inject, Injectable } from "@nestjs/common";
import * as client from "openid-client";
import { isRecord } from "./claims.js";
import { APP_CONFIG } from "../config/config.js";
import type { AppConfig } from "../config/config.js";
import {
  CallbackRejectedError,
  OAuthProviderError,
  ProviderUnavailableError,
} from "./errors.js";
import type { PendingLogin, TokenResponse } from "./types.js";

export interface AuthorizationRequest extends PendingLogin {
  url: URL;
}

interface TokenEndpointReply {
  status: number;
  body: unknown;
}

// Raw token endpoint reply of the exchange running in the current async context
const tokenReplies = new AsyncLocalStorage<{ reply?: TokenEndpointReply }>();

/**
 * Provider-facing operations the login flow depends on.
 * Used as the injection token so tests can swap in a fake provider.
 */
export abstract class OidcClient {
  abstract buildAuthorizationRequest(): Promise<AuthorizationRequest>;

  /**
   * Exchange the authorization code in `callbackUrl` for tokens.
   * Returns the token endpoint's fields as received; presence of the
   * expected tokens is checked by the caller.
   */
  abstract exchangeCode(callbackUrl: URL, pending: PendingLogin): Promise<TokenResponse>;

  abstract buildEndSessionUrl(idTokenHint?: string): URL;

  abstract isReachable(): Promise<boolean>;
}

@Injectable()
export class OpenIdConnectClient extends OidcClient {
  private readonly configuration: client.Configuration;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    super();
    const { provider } = config;

    this.configuration = new client.Configuration(
      {
        issuer: provider.issuer,
        authorization_endpoint: provider.authorizationEndpoint,
        token_endpoint: provider.tokenEndpoint,
        end_session_endpoint: provider.endSessionEndpoint,
      },
      config.client.id,
      config.client.secret,
    );

    this.configuration[client.customFetch] = async (url, options) => {
      const res = await fetch(url, { ...options, signal: AbortSignal.timeout(provider.timeoutMs) });
      const capture = tokenReplies.getStore();
      if (capture) {
        capture.reply = { status: res.status, body: await readJson(res.clone()) };
      }
      return res;
    };

    // Local Keycloak setups run on plain http
    const endpoints = [provider.authorizationEndpoint, provider.tokenEndpoint];
    if (endpoints.some((endpoint) => new URL(endpoint).protocol === "http:")) {
      client.allowInsecureRequests(this.configuration);
    }
  }

  async buildAuthorizationRequest(): Promise<AuthorizationRequest> {
    const codeVerifier = client.randomPKCECodeVerifier();
    const codeChallenge = await client.calculatePKCECodeChallenge(codeVerifier);
    const state = client.randomState();

    const url = client.buildAuthorizationUrl(this.configuration, {
      redirect_uri: this.config.client.redirectUri,
      scope: this.config.client.scopes,
      code_challenge: codeChallenge,
      code_challenge_method: "S256",
      state,
    });

    return { url, codeVerifier, state };
  }

  async exchangeCode(callbackUrl: URL, pending: PendingLogin): Promise<TokenResponse> {
    const capture: { reply?: TokenEndpointReply } = {};
    try {
      const tokens = await tokenReplies.run(capture, () =>
        client.authorizationCodeGrant(this.configuration, callbackUrl, {
          pkceCodeVerifier: pending.codeVerifier,
          expectedState: pending.state,
        }),
      );
      // Drop the helper methods openid-client attaches to the response
      return Object.fromEntries(
        Object.entries(tokens).filter(([, value]) => typeof value !== "function"),
      );
    } catch (err) {
      // openid-client refuses a successful reply that lacks a token; hand the
      // fields back so the caller reports which keys did arrive
      const incomplete = incompleteTokenReply(capture.reply);
      if (incomplete) {
        return incomplete;
      }
      throw toFlowError(err);
    }
  }

  buildEndSessionUrl(idTokenHint?: string): URL {
    const url = new URL(this.config.provider.endSessionEndpoint);
    url.searchParams.set("post_logout_redirect_uri", this.config.client.postLogoutRedirectUri);
    if (idTokenHint) {
      url.searchParams.set("id_token_hint", idTokenHint);
    }
    return url;
  }

  async isReachable(): Promise<boolean> {
    try {
      const res = await fetch(this.config.provider.discoveryUrl, {
        signal: AbortSignal.timeout(this.config.provider.timeoutMs),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}

/**
 * Rebuild the callback URL on top of the registered redirect URI.
 * openid-client sends the callback URL minus its query as `redirect_uri`,
 * which must equal the one sent with the authorization request, so only
 * the query is taken from the incoming request.
 */
export function callbackUrlFrom(redirectUri: string, originalUrl: string): URL {
  const url = new URL(redirectUri);
  const query = originalUrl.indexOf("?");
  url.search = query === -1 ? "" : originalUrl.slice(query);
  return url;
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch {
    return undefined;
  }
}

function hasToken(body: TokenResponse, key: string): boolean {
  const value = body[key];
  return typeof value === "string" && value.length > 0;
}

function incompleteTokenReply(reply: TokenEndpointReply | undefined): TokenResponse | undefined {
  if (!reply || reply.status !== 200 || !isRecord(reply.body) || "error" in reply.body) {
    return undefined;
  }
  const body = reply.body;
  return hasToken(body, "access_token") && hasToken(body, "id_token") ? undefined : body;
}

function causes(err: unknown): unknown[] {
  const chain: unknown[] = [];
  let current = err;
  while (current !== undefined && chain.length < 5) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

/**
 * Map an openid-client failure onto the flow's error kinds.
 * fetch rejects with TypeError on network failure and TimeoutError when the
 * abort signal fires; openid-client wraps either in a ClientError.
 */
export function toFlowError(err: unknown): Error {
  if (err instanceof client.AuthorizationResponseError || err instanceof client.ResponseBodyError) {
    return new OAuthProviderError(err.error, err);
  }

  for (const candidate of causes(err)) {
    if (candidate instanceof Error && candidate.name === "TimeoutError") {
      return new ProviderUnavailableError(true, err);
    }
    if (candidate instanceof TypeError && candidate.message === "fetch failed") {
      return new ProviderUnavailableError(false, err);
    }
  }

  const message = err instanceof Error ? err.message : String(err);
  return new CallbackRejectedError(message, err);
}
