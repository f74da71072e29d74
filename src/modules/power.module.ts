import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { powerConfig } from '../config/power.config';
import { CLOCK, systemClock } from '../common/clock';
import { PowerStoreService } from '../services/power-store.service';
import { DeviceService } from '../services/device.service';
import { TelemetryService } from '../services/telemetry.service';
import { AnalyticsService } from '../services/analytics.service';
import { DevicesController } from '../controllers/devices.controller';
import { MetersController } from '../controllers/meters.controller';
import { IngestionController } from '../controllers/ingestion.controller';
import { AnalyticsController } from '../controllers/analytics.controller';
import { HealthController } from '../controllers/health.controller';

@Module({
  imports: [ConfigModule.forFeature(powerConfig)],
  controllers: [
    DevicesController,
    MetersController,
    IngestionController,
    AnalyticsController,
    HealthController,
  ],
  providers: [
    PowerStoreService,
    DeviceService,
    TelemetryService,
    AnalyticsService,
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [DeviceService, TelemetryService, AnalyticsService],
})
export class PowerModule {}
