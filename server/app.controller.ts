import { Controller, Get, Inject } from "@nestjs/common";
import { AuthService } from "./auth/auth.service.js";
import { SERVICE_NAME } from "./metrics/metrics.service.js";

@Controller()
export class AppController {
  constructor(@Inject(AuthService) private readonly authService: AuthService) {}

  @Get("api/health")
  async health() {
    const oidc = (await this.authService.isProviderReachable()) ? "reachable" : "unreachable";
    return { status: "ok", service: SERVICE_NAME, oidc };
  }
}
