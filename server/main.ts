import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import compression from "compression";
import { AppModule } from "./app.module.js";
import { APP_CONFIG } from "./config/config.js";
import type { AppConfig } from "./config/config.js";
import { createSessionMiddleware, createSessionStore } from "./auth/session.middleware.js";

const logger = new Logger("Bootstrap");

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["error", "warn", "log"],
  });
  const config = app.get<AppConfig>(APP_CONFIG);

  // Trust reverse proxy
  app.set("trust proxy", 1);

  // Enable gzip/deflate compression for all responses
  app.use(compression());

  const store = createSessionStore(config);
  logger.log(`Session store: ${store ? "PostgreSQL" : "in-memory (no DB_HOST set)"}`);
  if (!config.session.cookieSecure) {
    logger.warn("Session cookie is not HTTPS-only; set COOKIE_SECURE=true in production");
  }
  app.use(createSessionMiddleware(config, store));

  await app.listen(config.port);
  logger.log(`Portal listening on port ${config.port} (realm ${config.provider.realm})`);
}

bootstrap().catch((err: unknown) => {
  logger.error("Startup failed", err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
