import { Module } from "@nestjs/common";
import { AppController } from "./app.controller.js";
import { ConfigModule } from "./config/config.module.js";
import { AuthModule } from "./auth/auth.module.js";
import { PagesModule } from "./pages/pages.module.js";
import { MetricsModule } from "./metrics/metrics.module.js";

@Module({
  imports: [ConfigModule, MetricsModule, AuthModule, PagesModule],
  controllers: [AppController],
})
export class AppModule {}
