import { Controller, Get, Inject, UseGuards } from "@nestjs/common";
import { APP_CONFIG } from "../config/config.js";
import type { AppConfig } from "../config/config.js";
import { displayName } from "../auth/claims.js";
import { SessionIdentity, SessionRoles } from "../auth/decorators/session.decorators.js";
import { LoginGuard } from "../auth/guards/login.guard.js";
import { Roles, RolesGuard } from "../auth/guards/roles.guard.js";
import { ADMIN_ROLE, USERS_ROLE } from "../auth/roles.js";
import type { Identity } from "../auth/types.js";

export interface DashboardView {
  title: string;
  mode: "user" | "admin";
  email: string;
  roles: string[];
}

/**
 * View models for the portal pages. Rendering them is left to the front end.
 */
@Controller()
export class PagesController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get()
  landing(@SessionIdentity() identity: Identity | undefined) {
    return {
      title: "Login",
      realm: this.config.provider.realm,
      providerUrl: this.config.provider.browserBase,
      user: identity ?? null,
      email: displayName(identity) ?? null,
    };
  }

  @Get("user")
  @Roles(USERS_ROLE)
  @UseGuards(RolesGuard, LoginGuard)
  userDashboard(
    @SessionIdentity() identity: Identity | undefined,
    @SessionRoles() roles: string[],
  ): DashboardView {
    return { title: "User", mode: "user", email: displayName(identity) ?? "user", roles };
  }

  @Get("admin")
  @Roles(ADMIN_ROLE)
  @UseGuards(RolesGuard, LoginGuard)
  adminDashboard(
    @SessionIdentity() identity: Identity | undefined,
    @SessionRoles() roles: string[],
  ): DashboardView {
    return { title: "Admin", mode: "admin", email: displayName(identity) ?? "user", roles };
  }

  @Get("no-role")
  noRole(@SessionIdentity() identity: Identity | undefined) {
    return { title: "No role", email: displayName(identity) ?? null };
  }
}
