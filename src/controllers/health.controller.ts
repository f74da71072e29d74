import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { PowerStoreService } from '../services/power-store.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly store: PowerStoreService) {}

  @Get()
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  check(): {
    status: string;
    timestamp: string;
    database: string;
    pendingOperations: number;
  } {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      database: this.store.isConnected ? 'connected' : 'disconnected',
      pendingOperations: this.store.pendingOperations,
    };
  }
}
