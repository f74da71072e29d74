import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsEnum,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { MeterType } from '../entities/power-meter.entity';
import { PowerState } from '../domain/power-state';

export class AddMeterDto {
  @ApiProperty({ enum: MeterType, example: MeterType.BATTERY })
  @IsEnum(MeterType)
  type!: MeterType;

  @ApiPropertyOptional({
    description: 'Usable capacity in Wh',
    example: 50,
    minimum: 0,
    default: 0,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  capacityWh?: number;

  @ApiPropertyOptional({ example: 'Main Battery' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  name?: string;
}

export class MeterSnapshotDto {
  @ApiProperty({ example: '6f1c2d3e-0000-4000-8000-000000000001' })
  id!: string;

  @ApiProperty({ example: 'dev-001' })
  deviceId!: string;

  @ApiProperty({ enum: MeterType })
  type!: MeterType;

  @ApiProperty({ example: 12.0 })
  voltage!: number;

  @ApiProperty({ example: 2.0 })
  currentDraw!: number;

  @ApiProperty({ example: 50 })
  capacityWh!: number;

  @ApiProperty({ example: 80, minimum: 0, maximum: 100 })
  chargePct!: number;

  @ApiProperty({ nullable: true, type: String, example: 'Main Battery' })
  name!: string | null;

  @ApiProperty({ description: 'voltage × current, 4 decimals', example: 24.0 })
  wattage!: number;

  @ApiProperty({ enum: PowerState, example: PowerState.NORMAL })
  state!: PowerState;
}
