import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MeterType } from '../entities/power-meter.entity';
import { PowerEvent } from '../entities/power-event.entity';
import { PowerState } from '../domain/power-state';

export class MeterReportDto {
  @ApiProperty({ example: '6f1c2d3e-0000-4000-8000-000000000001' })
  meterId!: string;

  @ApiProperty({ enum: MeterType, example: MeterType.BATTERY })
  type!: MeterType;

  @ApiProperty({ description: 'Readings inside the report window', example: 288 })
  readingCount!: number;

  @ApiPropertyOptional({ enum: PowerState, example: PowerState.NORMAL })
  currentState?: PowerState;

  @ApiPropertyOptional({ example: 21.5 })
  avgWattage?: number;

  @ApiPropertyOptional({ example: 24 })
  maxWattage?: number;

  @ApiPropertyOptional({ example: 60 })
  minChargePct?: number;
}

export class PowerReportDto {
  @ApiProperty({ example: 'dev-001' })
  deviceId!: string;

  @ApiProperty({ example: 7 })
  periodDays!: number;

  @ApiProperty({ example: '2026-02-09T10:30:00.000Z' })
  generatedAt!: string;

  @ApiProperty({ type: [MeterReportDto] })
  meters!: MeterReportDto[];

  @ApiProperty({
    description: 'Number of events in the fetched window of recent events',
    example: 42,
  })
  eventCount!: number;

  @ApiProperty({ description: 'Most recent events, newest first' })
  events!: PowerEvent[];
}
