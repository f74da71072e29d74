import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { TelemetryService } from '../services/telemetry.service';
import { LogPowerDto } from '../dto/power-reading.dto';
import { PowerReading } from '../entities/power-reading.entity';

@ApiTags('Ingestion')
@Controller('v1/ingest')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly telemetryService: TelemetryService) {}

  @Post('power')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Log a power reading',
    description:
      'Stores the reading, updates the meter\'s live values and raises battery threshold events',
  })
  @ApiResponse({ status: 201, description: 'Reading stored' })
  @ApiResponse({ status: 400, description: 'Invalid reading' })
  @ApiResponse({ status: 404, description: 'Meter not found' })
  async logPower(@Body() data: LogPowerDto): Promise<PowerReading> {
    this.logger.log(`Logging power for meter ${data.meterId}`);
    return this.telemetryService.logPower(data);
  }
}
