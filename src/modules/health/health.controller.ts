import { Controller, Get, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ApiTags, ApiOperation } from '@nestjs/swagger';
import { Public } from '../../common/auth/decorators/public.decorator';
import { DatabaseService } from '../../common/database/database.service';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(private readonly db: DatabaseService) {}

  @Get()
  @Public()
  @ApiOperation({ summary: 'Health check endpoint' })
  check() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'dental-clinic-backend',
      version: process.env.npm_package_version || '1.0.0',
    };
  }

  @Get('ready')
  @Public()
  @ApiOperation({ summary: 'Readiness probe, checks the database connection' })
  async ready() {
    let databaseUp: boolean;
    try {
      databaseUp = await this.db.ping();
    } catch (error) {
      this.logger.error('Database ping failed', error instanceof Error ? error.stack : String(error));
      databaseUp = false;
    }
    if (!databaseUp) {
      throw new ServiceUnavailableException({ code: 'service_unavailable', message: 'Database is not reachable.' });
    }
    return { status: 'ready', database: 'up' };
  }

  @Get('live')
  @Public()
  @ApiOperation({ summary: 'Liveness probe' })
  live() {
    return { status: 'live' };
  }
}
