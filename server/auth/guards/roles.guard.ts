import { CanActivate, ExecutionContext, Inject, Injectable, SetMetadata } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import type { Request } from "express";
import { MetricsService } from "../../metrics/metrics.service.js";
import { ForbiddenError, UnauthenticatedError } from "../errors.js";
import { hasRoles } from "../roles.js";

export const ROLES_KEY = "roles";

/** Roles a route requires; all of them must be held. */
export const Roles = (...roles: string[]) => SetMetadata(ROLES_KEY, roles);

/**
 * Guard that checks the session's roles against @Roles().
 * 401 when the session holds no roles at all, 403 when one is missing.
 * A denied request leaves the session as it is.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    @Inject(Reflector) private readonly reflector: Reflector,
    @Inject(MetricsService) private readonly metrics: MetricsService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const required =
      this.reflector.getAllAndOverride<string[] | undefined>(ROLES_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? [];

    const request = context.switchToHttp().getRequest<Request>();
    const roles = request.session?.auth?.roles ?? [];

    if (roles.length === 0) {
      this.metrics.incAccessDenied("unauthenticated");
      throw new UnauthenticatedError();
    }
    if (!hasRoles(roles, required)) {
      this.metrics.incAccessDenied("forbidden");
      throw new ForbiddenError();
    }
    return true;
  }
}
