import { Module } from "@nestjs/common";
import { AuthController } from "./auth.controller.js";
import { AuthService } from "./auth.service.js";
import { LoginGuard } from "./guards/login.guard.js";
import { RolesGuard } from "./guards/roles.guard.js";
import { OidcClient, OpenIdConnectClient } from "./oidc.js";

@Module({
  controllers: [AuthController],
  providers: [
    AuthService,
    LoginGuard,
    RolesGuard,
    { provide: OidcClient, useClass: OpenIdConnectClient },
  ],
  exports: [AuthService, LoginGuard, RolesGuard],
})
export class AuthModule {}
