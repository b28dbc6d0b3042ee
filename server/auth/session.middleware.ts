import type { Request, RequestHandler } from "express";
import session from "express-session";
import type { Session, Store } from "express-session";
import connectPgSimple from "connect-pg-simple";
import pg from "pg";
import type { AppConfig } from "../config/config.js";

/**
 * PostgreSQL session store when a database is configured, otherwise
 * undefined so express-session falls back to its in-memory store.
 */
export function createSessionStore(config: AppConfig): Store | undefined {
  const db = config.session.store;
  if (!db) return undefined;

  const PgStore = connectPgSimple(session);
  const pool = new pg.Pool({
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,
  });
  return new PgStore({ pool, createTableIfMissing: true });
}

export function createSessionMiddleware(config: AppConfig, store?: Store): RequestHandler {
  const middleware = session({
    secret: config.session.secret,
    resave: false,
    saveUninitialized: false,
    name: config.session.cookieName,
    store,
    cookie: {
      httpOnly: true,
      secure: config.session.cookieSecure,
      sameSite: "lax",
      maxAge: config.session.maxAgeMs,
    },
  });

  // Prometheus scrapes carry no cookie, no point in a session for them
  return (req, res, next) => {
    if (req.path === "/metrics") return next();
    middleware(req, res, next);
  };
}

export function saveSession(current: Session): Promise<void> {
  return new Promise((resolve, reject) => {
    current.save((err: unknown) => (err ? reject(err) : resolve()));
  });
}

/** Issue a new session id. `req.session` is a new object afterwards. */
export function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

export function destroySession(current: Session): Promise<void> {
  return new Promise((resolve, reject) => {
    current.destroy((err: unknown) => (err ? reject(err) : resolve()));
  });
}
