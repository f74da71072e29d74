import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Device } from '../entities/device.entity';
import { PowerEvent } from '../entities/power-event.entity';
import { DeviceService } from '../services/device.service';
import { TelemetryService } from '../services/telemetry.service';
import { AnalyticsService } from '../services/analytics.service';
import { RegisterDeviceDto } from '../dto/device.dto';
import { AddMeterDto, MeterSnapshotDto } from '../dto/meter.dto';
import { TriggerEventDto } from '../dto/power-event.dto';
import { PowerReportDto } from '../dto/power-report.dto';

@ApiTags('Devices')
@ApiParam({ name: 'deviceId', example: 'dev-001' })
@Controller('v1/devices')
export class DevicesController {
  constructor(
    private readonly deviceService: DeviceService,
    private readonly telemetryService: TelemetryService,
    private readonly analyticsService: AnalyticsService,
  ) {}

  @Put(':deviceId')
  @ApiOperation({
    summary: 'Register a device',
    description: 'Creates the device or overwrites an existing one with the same id',
  })
  @ApiResponse({ status: 200, description: 'Device registered' })
  registerDevice(
    @Param('deviceId') deviceId: string,
    @Body() body: RegisterDeviceDto,
  ): Promise<Device> {
    return this.deviceService.registerDevice({ id: deviceId, ...body });
  }

  @Get(':deviceId')
  @ApiOperation({ summary: 'Get a device' })
  @ApiResponse({ status: 404, description: 'Device not found' })
  getDevice(@Param('deviceId') deviceId: string): Promise<Device> {
    return this.deviceService.getDevice(deviceId);
  }

  @Post(':deviceId/meters')
  @ApiOperation({ summary: 'Attach a meter to a device' })
  @ApiResponse({ status: 201, type: MeterSnapshotDto })
  @ApiResponse({ status: 404, description: 'Device not found' })
  async addMeter(
    @Param('deviceId') deviceId: string,
    @Body() body: AddMeterDto,
  ): Promise<MeterSnapshotDto> {
    const meter = await this.deviceService.addMeter({ deviceId, ...body });
    return this.deviceService.describeMeter(meter);
  }

  @Post(':deviceId/events')
  @ApiOperation({ summary: 'Record a power event' })
  @ApiResponse({ status: 201, description: 'Event recorded' })
  @ApiResponse({ status: 404, description: 'Device not found' })
  triggerEvent(
    @Param('deviceId') deviceId: string,
    @Body() body: TriggerEventDto,
  ): Promise<PowerEvent> {
    return this.telemetryService.triggerEvent({ deviceId, ...body });
  }

  @Get(':deviceId/events')
  @ApiOperation({ summary: 'Most recent events of a device, newest first' })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  getEvents(
    @Param('deviceId') deviceId: string,
    @Query('limit', new ParseIntPipe({ optional: true })) limit?: number,
  ): Promise<PowerEvent[]> {
    return this.telemetryService.getEvents(deviceId, limit);
  }

  @Get(':deviceId/runtime')
  @ApiOperation({
    summary: 'Estimate remaining battery runtime',
    description: 'estimatedRuntimeHours is null when no battery meter is drawing current',
  })
  async estimateRuntime(
    @Param('deviceId') deviceId: string,
  ): Promise<{ deviceId: string; estimatedRuntimeHours: number | null }> {
    const estimatedRuntimeHours =
      await this.analyticsService.estimateRuntime(deviceId);
    return { deviceId, estimatedRuntimeHours };
  }

  @Get(':deviceId/report')
  @ApiOperation({ summary: 'Power report over the last N days' })
  @ApiQuery({ name: 'days', required: false, example: 7 })
  @ApiResponse({ status: 200, type: PowerReportDto })
  exportReport(
    @Param('deviceId') deviceId: string,
    @Query('days', new ParseIntPipe({ optional: true })) days?: number,
  ): Promise<PowerReportDto> {
    return this.analyticsService.exportReport(deviceId, days);
  }
}
