import { Controller, Get, Header, Inject, Res } from "@nestjs/common";
import type { Response } from "express";
import { MetricsService } from "./metrics.service.js";

@Controller()
export class MetricsController {
  constructor(@Inject(MetricsService) private readonly metricsService: MetricsService) {}

  /**
   * GET /metrics
   * Prometheus scrape endpoint.
   */
  @Get("metrics")
  @Header("Cache-Control", "no-store")
  async metrics(@Res() res: Response): Promise<void> {
    const body = await this.metricsService.getMetrics();
    res.type(this.metricsService.getContentType()).send(body);
  }
}
