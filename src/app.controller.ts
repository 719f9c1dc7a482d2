import { Controller, Get } from '@nestjs/common';
import { AppService, LivenessStatus } from './app.service';
import { HealthCheckDto } from './common/dto/health-check.dto';
import { SessionEngineStats } from './session/interfaces/session.interface';

/**
 * Operational endpoints. The engine itself has no HTTP API.
 */
@Controller('health')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  liveness(): LivenessStatus {
    return this.appService.getHealth();
  }

  @Get('detailed')
  detailed(): Promise<HealthCheckDto> {
    return this.appService.getDetailedHealth();
  }

  @Get('sessions')
  sessions(): SessionEngineStats {
    return this.appService.getSessionStats();
  }
}
