import { Controller, Get, Inject, Logger, Req, Res } from "@nestjs/common";
import type { Request, Response } from "express";
import { APP_CONFIG } from "../config/config.js";
import type { AppConfig } from "../config/config.js";
import { AuthService } from "./auth.service.js";
import { callbackUrlFrom } from "./oidc.js";
import {
  destroySession,
  regenerateSession,
  saveSession,
} from "./session.middleware.js";

@Controller()
export class AuthController {
  private readonly logger = new Logger(AuthController.name);

  constructor(
    @Inject(AuthService) private readonly authService: AuthService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * GET /login
   * Redirects the user to Keycloak's authorization endpoint.
   */
  @Get("login")
  async login(@Req() req: Request, @Res() res: Response): Promise<void> {
    const { url, codeVerifier, state } = await this.authService.beginLogin();

    req.session.oidc = { codeVerifier, state };
    await saveSession(req.session);

    res.redirect(url.href);
  }

  /**
   * GET /callback
   * Handles the authorization code callback and sends the user to the
   * page matching their roles.
   */
  @Get("callback")
  async callback(@Req() req: Request, @Res() res: Response): Promise<void> {
    const callbackUrl = callbackUrlFrom(this.config.client.redirectUri, req.originalUrl);

    // One attempt per state: a failed callback cannot be replayed
    const pending = req.session.oidc;
    delete req.session.oidc;

    const login = await this.authService.completeLogin(callbackUrl, pending);

    await regenerateSession(req);
    req.session.auth = login.auth;
    await saveSession(req.session);
    this.authService.loginEstablished(login);

    res.redirect(login.landing);
  }

  /**
   * GET /logout
   * Clears the session and redirects to Keycloak's end-session endpoint.
   */
  @Get("logout")
  async logout(@Req() req: Request, @Res() res: Response): Promise<void> {
    const idToken = req.session.auth?.idToken;

    try {
      await destroySession(req.session);
    } catch (err) {
      this.logger.error("Session destroy error", err instanceof Error ? err.stack : String(err));
    }

    res.clearCookie(this.config.session.cookieName);
    res.redirect(this.authService.completeLogout(idToken).href);
  }
}
