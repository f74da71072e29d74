import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, MoreThanOrEqual } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Device, DEFAULT_SHUTDOWN_THRESHOLD } from '../entities/device.entity';
import { MeterType, PowerMeter } from '../entities/power-meter.entity';
import { PowerReading } from '../entities/power-reading.entity';
import { PowerEventType, PowerEvent } from '../entities/power-event.entity';
import {
  DeviceNotFoundException,
  MeterNotFoundException,
} from '../common/power.exceptions';
import { SerialQueue } from '../common/serial-queue';

export interface DeviceRegistration {
  id: string;
  name: string;
  shutdownThreshold?: number;
  targetWh?: number | null;
}

export interface NewMeter {
  deviceId: string;
  type: MeterType;
  capacityWh?: number;
  name?: string | null;
}

export type MeterLiveFields = Pick<
  PowerMeter,
  'voltage' | 'currentDraw' | 'chargePct'
>;

export type NewReading = Omit<PowerReading, 'id'>;

export interface NewEvent {
  deviceId: string;
  type: PowerEventType;
  value: number;
  timestamp: string;
  note?: string | null;
}

/**
 * Storage gateway over devices, meters, readings and events.
 *
 * Every unit of work goes through one serial queue: SQLite has a single
 * writer anyway, and it keeps a reader from seeing another call's
 * uncommitted rows on the shared connection.
 */
@Injectable()
export class PowerStoreService {
  private readonly queue = new SerialQueue();

  constructor(private readonly dataSource: DataSource) {}

  /** Runs `work` in a transaction; any throw rolls back all of its writes. */
  transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.queue.run(() => this.dataSource.transaction(work));
  }

  read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.queue.run(() => work(this.dataSource.manager));
  }

  get pendingOperations(): number {
    return this.queue.size;
  }

  get isConnected(): boolean {
    return this.dataSource.isInitialized;
  }

  async upsertDevice(
    manager: EntityManager,
    registration: DeviceRegistration,
  ): Promise<Device> {
    await manager
      .createQueryBuilder()
      .insert()
      .into(Device)
      .values({
        id: registration.id,
        name: registration.name,
        shutdownThreshold:
          registration.shutdownThreshold ?? DEFAULT_SHUTDOWN_THRESHOLD,
        targetWh: registration.targetWh ?? null,
      })
      .orUpdate(['name', 'shutdown_threshold', 'target_wh'], ['id'])
      .execute();

    return this.getDevice(manager, registration.id);
  }

  async getDevice(manager: EntityManager, deviceId: string): Promise<Device> {
    const device = await manager.findOneBy(Device, { id: deviceId });
    if (!device) {
      throw new DeviceNotFoundException(deviceId);
    }
    return device;
  }

  async insertMeter(manager: EntityManager, meter: NewMeter): Promise<PowerMeter> {
    await this.getDevice(manager, meter.deviceId);

    const meterId = uuidv4();
    await manager.insert(PowerMeter, {
      id: meterId,
      deviceId: meter.deviceId,
      type: meter.type,
      capacityWh: meter.capacityWh ?? 0,
      name: meter.name ?? null,
    });

    return this.getMeter(manager, meterId);
  }

  async getMeter(manager: EntityManager, meterId: string): Promise<PowerMeter> {
    const meter = await manager.findOneBy(PowerMeter, { id: meterId });
    if (!meter) {
      throw new MeterNotFoundException(meterId);
    }
    return meter;
  }

  listMeters(manager: EntityManager, deviceId?: string): Promise<PowerMeter[]> {
    return manager.find(PowerMeter, {
      where: deviceId === undefined ? {} : { deviceId },
      order: { seq: 'ASC' },
    });
  }

  insertReading(manager: EntityManager, reading: NewReading): Promise<PowerReading> {
    return manager.save(manager.create(PowerReading, reading));
  }

  /** Last write wins: the previous live values are replaced, not averaged. */
  async updateMeterLiveFields(
    manager: EntityManager,
    meterId: string,
    fields: MeterLiveFields,
  ): Promise<void> {
    await manager.update(
      PowerMeter,
      { id: meterId },
      {
        voltage: fields.voltage,
        currentDraw: fields.currentDraw,
        chargePct: fields.chargePct,
      },
    );
  }

  insertEvent(manager: EntityManager, event: NewEvent): Promise<PowerEvent> {
    return manager.save(
      manager.create(PowerEvent, { ...event, note: event.note ?? null }),
    );
  }

  /** Most recent first. */
  listEventsForDevice(
    manager: EntityManager,
    deviceId: string,
    limit: number,
  ): Promise<PowerEvent[]> {
    return manager.find(PowerEvent, {
      where: { deviceId },
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit,
    });
  }

  /** Oldest first, `since` inclusive. */
  listReadingsForMeterSince(
    manager: EntityManager,
    meterId: string,
    since: string,
  ): Promise<PowerReading[]> {
    return manager.find(PowerReading, {
      where: { meterId, timestamp: MoreThanOrEqual(since) },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }
}
