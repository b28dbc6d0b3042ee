import { CanActivate, ExecutionContext, Inject, Injectable } from "@nestjs/common";
import type { Request } from "express";
import { MetricsService } from "../../metrics/metrics.service.js";
import { UnauthenticatedError } from "../errors.js";

/**
 * Guard that requires an authenticated session.
 * Throws 401 if no identity is stored.
 */
@Injectable()
export class LoginGuard implements CanActivate {
  constructor(@Inject(MetricsService) private readonly metrics: MetricsService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    if (!request.session?.auth?.identity) {
      this.metrics.incAccessDenied("unauthenticated");
      throw new UnauthenticatedError();
    }
    return true;
  }
}
