import { Controller, Get } from '@nestjs/common';
import { SessionRegistryService } from './chat/session/session-registry.service';

@Controller('health')
export class HealthController {
  constructor(private readonly registry: SessionRegistryService) {}

  @Get()
  check(): { status: 'ok'; sessions: number; uptime: number } {
    return {
      status: 'ok',
      sessions: this.registry.count(),
      uptime: Math.round(process.uptime()),
    };
  }
}
