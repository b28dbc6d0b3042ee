/**
 * Process configuration.
 *
 * Everything the server needs from the environment is parsed once here into a
 * frozen `AppConfig` and handed to the rest of the app through the `APP_CONFIG`
 * injection token.
 */

import { z } from "zod";

export const APP_CONFIG = "APP_CONFIG";

const SCOPES = "openid profile email";

const baseUrl = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ""));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  KEYCLOAK_BROWSER_BASE: baseUrl.default("http://localhost:8080"),
  KEYCLOAK_BACKEND_BASE: baseUrl.default("http://host.docker.internal:8080"),
  KEYCLOAK_REALM: z.string().min(1).default("demo-realm"),
  OIDC_ISSUER: baseUrl.optional(),
  OIDC_CLIENT_ID: z.string().min(1).default("portal-client"),
  OIDC_CLIENT_SECRET: z.string().default(""),
  OIDC_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  APP_BASE: baseUrl.default("http://localhost:8000"),
  SESSION_SECRET: z.string().min(1).default("dev_session_secret_change_me"),
  SESSION_MAX_AGE_HOURS: z.coerce.number().positive().default(8),
  COOKIE_SECURE: z.enum(["true", "false"]).default("false"),
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().min(1).default("portal"),
  DB_USER: z.string().min(1).default("portal"),
  DB_PASS: z.string().optional(),
});

export interface SessionStoreConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password?: string;
}

export interface AppConfig {
  readonly port: number;
  readonly provider: {
    readonly browserBase: string;
    readonly backendBase: string;
    readonly realm: string;
    readonly issuer: string;
    readonly authorizationEndpoint: string;
    readonly tokenEndpoint: string;
    readonly endSessionEndpoint: string;
    readonly discoveryUrl: string;
    readonly timeoutMs: number;
  };
  readonly client: {
    readonly id: string;
    readonly secret: string;
    readonly scopes: string;
    readonly redirectUri: string;
    readonly postLogoutRedirectUri: string;
  };
  readonly appBase: string;
  readonly session: {
    readonly secret: string;
    readonly cookieName: string;
    readonly cookieSecure: boolean;
    readonly maxAgeMs: number;
    readonly store?: SessionStoreConfig;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Parse environment variables into an immutable config.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  const realmPath = `/realms/${encodeURIComponent(e.KEYCLOAK_REALM)}`;
  const browserRealm = `${e.KEYCLOAK_BROWSER_BASE}${realmPath}`;
  const backendRealm = `${e.KEYCLOAK_BACKEND_BASE}${realmPath}`;

  const store: SessionStoreConfig | undefined = e.DB_HOST
    ? {
        host: e.DB_HOST,
        port: e.DB_PORT,
        database: e.DB_NAME,
        user: e.DB_USER,
        password: e.DB_PASS,
      }
    : undefined;

  const config: AppConfig = {
    port: e.PORT,
    provider: {
      browserBase: e.KEYCLOAK_BROWSER_BASE,
      backendBase: e.KEYCLOAK_BACKEND_BASE,
      realm: e.KEYCLOAK_REALM,
      // `iss` the provider stamps into ID tokens; Keycloak without a fixed
      // hostname uses whichever host the token request came in on
      issuer: e.OIDC_ISSUER ?? browserRealm,
      authorizationEndpoint: `${browserRealm}/protocol/openid-connect/auth`,
      tokenEndpoint: `${backendRealm}/protocol/openid-connect/token`,
      endSessionEndpoint: `${browserRealm}/protocol/openid-connect/logout`,
      discoveryUrl: `${backendRealm}/.well-known/openid-configuration`,
      timeoutMs: e.OIDC_TIMEOUT_MS,
    },
    client: {
      id: e.OIDC_CLIENT_ID,
      secret: e.OIDC_CLIENT_SECRET,
      scopes: SCOPES,
      // Must match the redirect URI registered for the client exactly
      redirectUri: `${e.APP_BASE}/callback`,
      postLogoutRedirectUri: `${e.APP_BASE}/`,
    },
    appBase: e.APP_BASE,
    session: {
      secret: e.SESSION_SECRET,
      cookieName: "portal.sid",
      cookieSecure: e.COOKIE_SECURE === "true",
      maxAgeMs: e.SESSION_MAX_AGE_HOURS * 60 * 60 * 1000,
      store,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
