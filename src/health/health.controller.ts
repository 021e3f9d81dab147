import { Controller, Get } from '@nestjs/common';
import { getVersion } from '../config/webhook.config.js';
import { LEGACY_API_VERSION, TENANT_API_VERSION } from '../types/tenant.js';

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  version: string;
  /** Tenant API versions this webhook converts between. */
  servedVersions: string[];
}

@Controller('health')
export class HealthController {
  private readonly startedAt = Date.now();

  @Get()
  getHealth(): HealthResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      version: getVersion(),
      servedVersions: [LEGACY_API_VERSION, TENANT_API_VERSION],
    };
  }
}
