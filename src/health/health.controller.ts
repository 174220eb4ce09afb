import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import { SkipRateLimit } from '../rate-limit/decorators/skip-rate-limit.decorator';

@ApiTags('Health')
@Controller('health')
@SkipRateLimit()
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private db: TypeOrmHealthIndicator,
  ) {}

  @HealthCheck()
  @Get()
  @ApiOperation({ summary: 'Readiness probe: pings the database' })
  readiness(): Promise<HealthCheckResult> {
    return this.health.check([() => this.db.pingCheck('database')]);
  }

  @Get('liveness')
  @ApiOperation({ summary: 'Liveness probe' })
  liveness() {
    // Stays up when the database is unreachable so the process is not restarted.
    return {
      status: 'ok',
      info: {
        api: { status: 'up' },
      },
    };
  }
}
