import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';

export class RegisterDeviceDto {
  @ApiProperty({ description: 'Display name of the device', example: 'Edge Node' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiPropertyOptional({
    description: 'Charge percentage at which the device should shut down',
    example: 3.0,
    default: 3.0,
  })
  @IsOptional()
  @IsNumber()
  shutdownThreshold?: number;

  @ApiPropertyOptional({
    description: 'Daily energy target in Wh',
    example: 120,
  })
  @IsOptional()
  @IsNumber()
  targetWh?: number;
}
