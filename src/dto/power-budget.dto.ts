import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsString } from 'class-validator';
import { PowerState } from '../domain/power-state';

export class PowerBudgetRequestDto {
  @ApiProperty({
    description: 'Devices to check; each is evaluated independently',
    example: ['dev-001', 'dev-002'],
    type: [String],
  })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  deviceIds!: string[];
}

export class DeviceBudgetDto {
  @ApiProperty({ description: 'Sum of live wattage over all meters', example: 36.5 })
  totalWattage!: number;

  @ApiProperty({ example: 1 })
  batteryCount!: number;

  @ApiProperty({ example: 1 })
  solarCount!: number;

  @ApiProperty({
    description: 'Mean charge of battery meters, null without batteries',
    example: 72.5,
    nullable: true,
    type: Number,
  })
  avgChargePct!: number | null;

  @ApiProperty({
    description: 'Runtime of the first drawing battery meter, in hours',
    example: 1.67,
    nullable: true,
    type: Number,
  })
  estimatedRuntimeHours!: number | null;

  @ApiProperty({
    description: 'State of each meter, in creation order',
    enum: PowerState,
    isArray: true,
  })
  states!: PowerState[];
}

export class DeviceBudgetErrorDto {
  @ApiProperty({ example: 'Device not found: dev-404' })
  error!: string;
}

/** Keyed by device id. */
export type PowerBudgetReport = Record<string, DeviceBudgetDto | DeviceBudgetErrorDto>;
