import { Inject, Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { MeterType, PowerMeter } from '../entities/power-meter.entity';
import { PowerReading } from '../entities/power-reading.entity';
import { powerConfig, PowerConfig } from '../config/power.config';
import { CLOCK, Clock } from '../common/clock';
import {
  classifyPowerState,
  calculateWattage,
  estimateRuntimeHours,
  roundTo,
} from '../domain/power-calculations';
import { DeviceBudgetDto, PowerBudgetReport } from '../dto/power-budget.dto';
import { MeterReportDto, PowerReportDto } from '../dto/power-report.dto';
import { PowerStoreService } from './power-store.service';

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly store: PowerStoreService,
    @Inject(powerConfig.KEY)
    private readonly config: PowerConfig,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Hours of battery left, or null when the device has no battery meter
   * drawing current. Meters are considered in creation order.
   */
  estimateRuntime(deviceId: string): Promise<number | null> {
    return this.store.read(async (manager) => {
      await this.store.getDevice(manager, deviceId);
      const meters = await this.store.listMeters(manager, deviceId);
      return estimateRuntimeHours(meters);
    });
  }

  /**
   * Budget summary per device. A device that cannot be evaluated gets an
   * error entry; the remaining ids are still checked.
   */
  async powerBudgetCheck(deviceIds: readonly string[]): Promise<PowerBudgetReport> {
    const results = new Map<string, PowerBudgetReport[string]>();

    for (const deviceId of deviceIds) {
      try {
        results.set(
          deviceId,
          await this.store.read((manager) => this.budgetFor(manager, deviceId)),
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Budget check for ${deviceId} failed: ${message}`);
        results.set(deviceId, { error: message });
      }
    }

    // own data properties, so a "__proto__" id stays a key
    return Object.fromEntries(results);
  }

  getHistory(
    meterId: string,
    hours: number = this.config.historyDefaultHours,
  ): Promise<PowerReading[]> {
    return this.store.read(async (manager) => {
      await this.store.getMeter(manager, meterId);
      return this.store.listReadingsForMeterSince(
        manager,
        meterId,
        this.windowStart(hours),
      );
    });
  }

  async exportReport(
    deviceId: string,
    days: number = this.config.reportDefaultDays,
  ): Promise<PowerReportDto> {
    const startTime = Date.now();

    const report = await this.store.read(async (manager) => {
      await this.store.getDevice(manager, deviceId);
      const meters = await this.store.listMeters(manager, deviceId);
      const since = this.windowStart(days * 24);

      const meterReports: MeterReportDto[] = [];
      for (const meter of meters) {
        const readings = await this.store.listReadingsForMeterSince(
          manager,
          meter.id,
          since,
        );
        meterReports.push(this.summarizeMeter(meter, readings));
      }

      const events = await this.store.listEventsForDevice(
        manager,
        deviceId,
        this.config.reportEventWindow,
      );

      return {
        deviceId,
        periodDays: days,
        generatedAt: this.clock.now().toISOString(),
        meters: meterReports,
        eventCount: events.length,
        events: events.slice(0, this.config.reportEmbeddedEvents),
      };
    });

    const duration = Date.now() - startTime;
    this.logger.log(
      `Report for ${deviceId} over ${days}d built in ${duration}ms (${report.meters.length} meters)`,
    );

    return report;
  }

  private async budgetFor(
    manager: EntityManager,
    deviceId: string,
  ): Promise<DeviceBudgetDto> {
    await this.store.getDevice(manager, deviceId);
    const meters = await this.store.listMeters(manager, deviceId);

    const totalWattage = meters.reduce(
      (sum, m) => sum + calculateWattage(m.voltage, m.currentDraw),
      0,
    );
    const batteries = meters.filter((m) => m.type === MeterType.BATTERY);
    const solarCount = meters.filter((m) => m.type === MeterType.SOLAR).length;

    const avgChargePct =
      batteries.length > 0
        ? roundTo(
            batteries.reduce((sum, m) => sum + m.chargePct, 0) / batteries.length,
            2,
          )
        : null;

    return {
      totalWattage: roundTo(totalWattage, 4),
      batteryCount: batteries.length,
      solarCount,
      avgChargePct,
      estimatedRuntimeHours: estimateRuntimeHours(meters),
      states: meters.map((m) => classifyPowerState(m, this.config.thresholds)),
    };
  }

  private summarizeMeter(
    meter: PowerMeter,
    readings: readonly PowerReading[],
  ): MeterReportDto {
    if (readings.length === 0) {
      return { meterId: meter.id, type: meter.type, readingCount: 0 };
    }

    const wattages = readings.map((r) => r.wattage);
    const charges = readings.map((r) => r.chargePct);

    return {
      meterId: meter.id,
      type: meter.type,
      currentState: classifyPowerState(meter, this.config.thresholds),
      avgWattage: roundTo(
        wattages.reduce((sum, w) => sum + w, 0) / wattages.length,
        4,
      ),
      maxWattage: wattages.reduce((max, w) => Math.max(max, w), -Infinity),
      minChargePct: charges.reduce((min, c) => Math.min(min, c), Infinity),
      readingCount: readings.length,
    };
  }

  private windowStart(hours: number): string {
    return new Date(this.clock.now().getTime() - hours * HOUR_MS).toISOString();
  }
}
