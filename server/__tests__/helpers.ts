/**
 * Shared test helpers: Nest app factory via TestingModule, a fake identity
 * provider, token fixtures.
 */
import { Test } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import type { Store } from "express-session";
import { AppModule } from "../app.module.js";
import { APP_CONFIG, loadConfig } from "../config/config.js";
import type { AppConfig } from "../config/config.js";
import { OidcClient, OpenIdConnectClient } from "../auth/oidc.js";
import { CallbackRejectedError } from "../auth/errors.js";
import { createSessionMiddleware } from "../auth/session.middleware.js";
import type { AuthenticatedSession, PendingLogin, TokenResponse } from "../auth/types.js";

export const TEST_ENV = {
  KEYCLOAK_BROWSER_BASE: "http://localhost:8080",
  KEYCLOAK_BACKEND_BASE: "http://keycloak:8080",
  KEYCLOAK_REALM: "demo-realm",
  OIDC_CLIENT_ID: "portal-client",
  OIDC_CLIENT_SECRET: "test-secret",
  APP_BASE: "http://localhost:8000",
  SESSION_SECRET: "test-secret",
} satisfies NodeJS.ProcessEnv;

export const TEST_CONFIG = loadConfig(TEST_ENV);

/** Unsigned compact JWT carrying `claims`; nothing here checks signatures. */
export function fakeJwt(claims: Record<string, unknown>): string {
  const encode = (part: object) => Buffer.from(JSON.stringify(part)).toString("base64url");
  return `${encode({ alg: "RS256", typ: "JWT" })}.${encode(claims)}.test-signature`;
}

/**
 * In-process stand-in for Keycloak. URL building is the real client's;
 * the token endpoint and discovery check are replaced.
 */
export class FakeProvider extends OpenIdConnectClient {
  tokenResponse: TokenResponse = {};
  failure?: Error;
  reachable = false;
  readonly exchanges: Array<{ callbackUrl: URL; pending: PendingLogin }> = [];

  constructor(config: AppConfig = TEST_CONFIG) {
    super(config);
  }

  /** Answer the next code exchange with an ID token and access token. */
  issueTokens(idClaims: Record<string, unknown>, accessClaims: Record<string, unknown>): {
    idToken: string;
    accessToken: string;
  } {
    const idToken = fakeJwt(idClaims);
    const accessToken = fakeJwt(accessClaims);
    this.tokenResponse = {
      access_token: accessToken,
      id_token: idToken,
      token_type: "Bearer",
      expires_in: 300,
    };
    return { idToken, accessToken };
  }

  async exchangeCode(callbackUrl: URL, pending: PendingLogin): Promise<TokenResponse> {
    this.exchanges.push({ callbackUrl, pending });
    if (callbackUrl.searchParams.get("state") !== pending.state) {
      throw new CallbackRejectedError("unexpected \"state\" response parameter value");
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.tokenResponse;
  }

  async isReachable(): Promise<boolean> {
    return this.reachable;
  }
}

export interface TestAppOptions {
  config?: AppConfig;
  /** Session store; express-session's memory store when omitted. */
  store?: Store;
  seed?: AuthenticatedSession;
}

async function buildApp(
  provider: FakeProvider,
  { config = TEST_CONFIG, store, seed }: TestAppOptions = {},
): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(APP_CONFIG)
    .useValue(config)
    .overrideProvider(OidcClient)
    .useValue(provider)
    .compile();

  const app = moduleRef.createNestApplication({ logger: false });

  // Session middleware (same as production)
  app.use(createSessionMiddleware(config, store));

  // Inject fake auth session data
  if (seed) {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      req.session.auth = seed;
      next();
    });
  }

  await app.init();
  return app;
}

/**
 * Creates a NestJS test application talking to the given fake provider.
 */
export async function createTestApp(
  provider: FakeProvider = new FakeProvider(),
  options: Omit<TestAppOptions, "seed"> = {},
): Promise<INestApplication> {
  return buildApp(provider, options);
}

/**
 * Creates a NestJS test application where every request carries `auth`
 * in its session.
 */
export async function createAuthenticatedTestApp(
  auth: Partial<AuthenticatedSession> & Pick<AuthenticatedSession, "roles">,
): Promise<INestApplication> {
  return buildApp(new FakeProvider(), {
    seed: {
      identity: auth.identity ?? {
        subject: "sub-1",
        email: "alice@example.com",
        preferredUsername: "alice",
      },
      roles: auth.roles,
      idToken: auth.idToken ?? fakeJwt({ sub: "sub-1" }),
    },
  });
}
