import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';

export class LogPowerDto {
  @ApiProperty({
    description: 'Meter the reading belongs to',
    example: '6f1c2d3e-0000-4000-8000-000000000001',
  })
  @IsString()
  @IsNotEmpty()
  meterId!: string;

  @ApiProperty({ description: 'Voltage in Volts', example: 12.0 })
  @IsNumber()
  voltage!: number;

  @ApiProperty({ description: 'Current draw in Amperes', example: 2.0 })
  @IsNumber()
  currentDraw!: number;

  @ApiPropertyOptional({
    description:
      'State of charge in percent; clamped to 0-100, defaults to the meter\'s last value',
    example: 80,
  })
  @IsOptional()
  @IsNumber()
  chargePct?: number;
}
