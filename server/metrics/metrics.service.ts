import { Injectable } from "@nestjs/common";
import { Registry, Counter, collectDefaultMetrics } from "prom-client";
import type { LoginFailureReason } from "../auth/errors.js";

export const SERVICE_NAME = "oidc-rbac-portal";

export type LandingLabel = "admin" | "user" | "no_role";
export type DenialReason = "unauthenticated" | "forbidden";

@Injectable()
export class MetricsService {
  readonly registry: Registry;

  // Counters, cumulative since process start
  private readonly loginsCounter: Counter<"landing">;
  private readonly loginFailuresCounter: Counter<"reason">;
  private readonly accessDeniedCounter: Counter<"reason">;
  private readonly logoutsCounter: Counter;

  constructor() {
    this.registry = new Registry();
    this.registry.setDefaultLabels({ service: SERVICE_NAME });

    // Collect default Node.js metrics (GC, event loop, memory, etc.)
    collectDefaultMetrics({ register: this.registry });

    this.loginsCounter = new Counter({
      name: "portal_logins_total",
      help: "Successful OIDC callbacks by landing page",
      labelNames: ["landing"] as const,
      registers: [this.registry],
    });

    this.loginFailuresCounter = new Counter({
      name: "portal_login_failures_total",
      help: "Failed OIDC callbacks by reason",
      labelNames: ["reason"] as const,
      registers: [this.registry],
    });

    this.accessDeniedCounter = new Counter({
      name: "portal_access_denied_total",
      help: "Requests rejected by the role gate",
      labelNames: ["reason"] as const,
      registers: [this.registry],
    });

    this.logoutsCounter = new Counter({
      name: "portal_logouts_total",
      help: "Logouts since process start",
      registers: [this.registry],
    });
  }

  incLogin(landing: LandingLabel): void {
    this.loginsCounter.inc({ landing });
  }

  incLoginFailure(reason: LoginFailureReason): void {
    this.loginFailuresCounter.inc({ reason });
  }

  incAccessDenied(reason: DenialReason): void {
    this.accessDeniedCounter.inc({ reason });
  }

  incLogout(): void {
    this.logoutsCounter.inc();
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}
