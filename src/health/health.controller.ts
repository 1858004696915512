import { Controller, Get } from '@nestjs/common';
import { HealthPayload, HealthService } from './health.service';

/**
 * Liveness endpoint for load balancers and monitoring. Served outside the API prefix.
 */
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  getRoot(): HealthPayload {
    return this.healthService.getHealth();
  }

  @Get('health')
  getHealth(): HealthPayload {
    return this.healthService.getHealth();
  }
}
