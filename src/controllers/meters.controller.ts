import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PowerReading } from '../entities/power-reading.entity';
import { DeviceService } from '../services/device.service';
import { TelemetryService } from '../services/telemetry.service';
import { AnalyticsService } from '../services/analytics.service';
import { MeterSnapshotDto } from '../dto/meter.dto';

@ApiTags('Meters')
@Controller('v1/meters')
export class MetersController {
  constructor(
    private readonly deviceService: DeviceService,
    private readonly telemetryService: TelemetryService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List meters in creation order' })
  @ApiQuery({ name: 'deviceId', required: false, example: 'dev-001' })
  @ApiResponse({ status: 200, type: [MeterSnapshotDto] })
  async listMeters(
    @Query('deviceId') deviceId?: string,
  ): Promise<MeterSnapshotDto[]> {
    const meters = await this.deviceService.listMeters(deviceId);
    return meters.map((meter) => this.deviceService.describeMeter(meter));
  }

  @Get(':meterId')
  @ApiOperation({ summary: 'Get a meter with its derived wattage and state' })
  @ApiResponse({ status: 200, type: MeterSnapshotDto })
  @ApiResponse({ status: 404, description: 'Meter not found' })
  async getMeter(@Param('meterId') meterId: string): Promise<MeterSnapshotDto> {
    const meter = await this.deviceService.getMeter(meterId);
    return this.deviceService.describeMeter(meter);
  }

  @Get(':meterId/wattage')
  @ApiOperation({ summary: 'Current wattage of a meter' })
  async calculateWattage(
    @Param('meterId') meterId: string,
  ): Promise<{ meterId: string; wattage: number }> {
    const wattage = await this.telemetryService.calculateWattage(meterId);
    return { meterId, wattage };
  }

  @Get(':meterId/history')
  @ApiOperation({ summary: 'Readings of the last N hours, oldest first' })
  @ApiQuery({ name: 'hours', required: false, example: 24 })
  getHistory(
    @Param('meterId') meterId: string,
    @Query('hours', new ParseIntPipe({ optional: true })) hours?: number,
  ): Promise<PowerReading[]> {
    return this.analyticsService.getHistory(meterId, hours);
  }
}
