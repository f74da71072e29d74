import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';
import { PowerReading } from '../entities/power-reading.entity';
import { PowerEvent } from '../entities/power-event.entity';
import { powerConfig, PowerConfig } from '../config/power.config';
import { CLOCK, Clock } from '../common/clock';
import { parsePowerEventType } from '../domain/power-enums';
import {
  autoEventForReading,
  calculateWattage,
  clampChargePct,
} from '../domain/power-calculations';
import { PowerStoreService } from './power-store.service';

export interface LogPowerInput {
  meterId: string;
  voltage: number;
  currentDraw: number;
  /** Falls back to the meter's stored charge when omitted. */
  chargePct?: number;
}

export interface TriggerEventInput {
  deviceId: string;
  type: string;
  value?: number;
  note?: string | null;
}

@Injectable()
export class TelemetryService {
  private readonly logger = new Logger(TelemetryService.name);

  constructor(
    private readonly store: PowerStoreService,
    @Inject(powerConfig.KEY)
    private readonly config: PowerConfig,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Records one reading for a meter:
   * 1. INSERT the reading into history
   * 2. overwrite the meter's live voltage, current and charge
   * 3. for battery meters, append a low_battery or discharge event when the
   *    charge is at or under a threshold
   *
   * All three happen in a single transaction.
   */
  async logPower(input: LogPowerInput): Promise<PowerReading> {
    const startTime = Date.now();

    try {
      const { reading, event } = await this.store.transaction(async (manager) => {
        const meter = await this.store.getMeter(manager, input.meterId);
        const wattage = calculateWattage(input.voltage, input.currentDraw);
        const chargePct = clampChargePct(input.chargePct ?? meter.chargePct);
        const timestamp = this.clock.now().toISOString();

        const reading = await this.store.insertReading(manager, {
          meterId: meter.id,
          voltage: input.voltage,
          currentDraw: input.currentDraw,
          wattage,
          chargePct,
          timestamp,
        });

        await this.store.updateMeterLiveFields(manager, meter.id, {
          voltage: input.voltage,
          currentDraw: input.currentDraw,
          chargePct,
        });

        const eventType = autoEventForReading(
          meter.type,
          chargePct,
          this.config.thresholds,
        );
        const event = eventType
          ? await this.store.insertEvent(manager, {
              deviceId: meter.deviceId,
              type: eventType,
              value: chargePct,
              timestamp,
            })
          : null;

        return { reading, event };
      });

      if (event) {
        this.logEvent(event);
      }

      const duration = Date.now() - startTime;
      this.logger.debug(
        `Meter ${reading.meterId} logged ${reading.wattage}W at ${reading.chargePct}% in ${duration}ms`,
      );

      return reading;
    } catch (error) {
      this.logFailure('log power', error);
      throw error;
    }
  }

  async calculateWattage(meterId: string): Promise<number> {
    const meter = await this.store.read((manager) =>
      this.store.getMeter(manager, meterId),
    );
    return calculateWattage(meter.voltage, meter.currentDraw);
  }

  async triggerEvent(input: TriggerEventInput): Promise<PowerEvent> {
    try {
      const event = await this.store.transaction(async (manager) => {
        await this.store.getDevice(manager, input.deviceId);
        return this.store.insertEvent(manager, {
          deviceId: input.deviceId,
          type: parsePowerEventType(input.type),
          value: input.value ?? 0,
          timestamp: this.clock.now().toISOString(),
          note: input.note,
        });
      });

      this.logEvent(event);
      return event;
    } catch (error) {
      this.logFailure('trigger event', error);
      throw error;
    }
  }

  getEvents(
    deviceId: string,
    limit: number = this.config.eventsDefaultLimit,
  ): Promise<PowerEvent[]> {
    return this.store.read(async (manager) => {
      await this.store.getDevice(manager, deviceId);
      return this.store.listEventsForDevice(manager, deviceId, limit);
    });
  }

  private logEvent(event: PowerEvent): void {
    this.logger.log(
      `Power event ${event.type} for device ${event.deviceId} value=${event.value.toFixed(2)}`,
    );
  }

  // Not-found and bad-enum errors belong to the caller; only log the rest
  private logFailure(operation: string, error: unknown): void {
    if (error instanceof HttpException) return;

    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Failed to ${operation}: ${err.message}`, err.stack);
  }
}
