import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { Public } from '../api/decorators/public.decorator';

/** Liveness check. Answers without touching the database. */
@ApiTags('Health')
@Controller('health')
@SkipThrottle()
@Public()
export class HealthController {
  @Get()
  check(): { status: 'ok' } {
    return { status: 'ok' };
  }
}
