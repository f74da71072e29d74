import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsNumber, IsOptional, IsString } from 'class-validator';
import { PowerEventType } from '../entities/power-event.entity';

export class TriggerEventDto {
  @ApiProperty({ enum: PowerEventType, example: PowerEventType.CHARGE_START })
  @IsEnum(PowerEventType)
  type!: PowerEventType;

  @ApiPropertyOptional({ example: 85, default: 0 })
  @IsOptional()
  @IsNumber()
  value?: number;

  @ApiPropertyOptional({ example: 'Grid power restored' })
  @IsOptional()
  @IsString()
  note?: string;
}
