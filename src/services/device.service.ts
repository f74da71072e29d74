import { Inject, Injectable, Logger } from '@nestjs/common';
import { Device } from '../entities/device.entity';
import { PowerMeter } from '../entities/power-meter.entity';
import { powerConfig, PowerConfig } from '../config/power.config';
import { parseMeterType } from '../domain/power-enums';
import { MeterSnapshot, toMeterSnapshot } from '../domain/power-calculations';
import { DeviceRegistration, PowerStoreService } from './power-store.service';

export interface AddMeterInput {
  deviceId: string;
  type: string;
  capacityWh?: number;
  name?: string | null;
}

@Injectable()
export class DeviceService {
  private readonly logger = new Logger(DeviceService.name);

  constructor(
    private readonly store: PowerStoreService,
    @Inject(powerConfig.KEY)
    private readonly config: PowerConfig,
  ) {}

  /**
   * Creates the device, or overwrites name, threshold and target of an
   * existing one with the same id.
   */
  async registerDevice(registration: DeviceRegistration): Promise<Device> {
    const device = await this.store.transaction((manager) =>
      this.store.upsertDevice(manager, registration),
    );
    this.logger.log(`Registered device ${device.id} (${device.name})`);
    return device;
  }

  getDevice(deviceId: string): Promise<Device> {
    return this.store.read((manager) => this.store.getDevice(manager, deviceId));
  }

  async addMeter(input: AddMeterInput): Promise<PowerMeter> {
    const meter = await this.store.transaction(async (manager) => {
      // An unknown device is reported ahead of an unknown type
      await this.store.getDevice(manager, input.deviceId);
      return this.store.insertMeter(manager, {
        deviceId: input.deviceId,
        type: parseMeterType(input.type),
        capacityWh: input.capacityWh,
        name: input.name,
      });
    });
    this.logger.log(
      `Added ${meter.type} meter ${meter.id} to device ${meter.deviceId}`,
    );
    return meter;
  }

  getMeter(meterId: string): Promise<PowerMeter> {
    return this.store.read((manager) => this.store.getMeter(manager, meterId));
  }

  /** An empty `deviceId` lists every meter, like an absent one. */
  listMeters(deviceId?: string): Promise<PowerMeter[]> {
    const filter = deviceId ? deviceId : undefined;
    return this.store.read((manager) => this.store.listMeters(manager, filter));
  }

  describeMeter(meter: PowerMeter): MeterSnapshot {
    return toMeterSnapshot(meter, this.config.thresholds);
  }
}
