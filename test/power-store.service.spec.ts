import { QueryFailedError } from 'typeorm';
import { Device } from '../src/entities/device.entity';
import { MeterType } from '../src/entities/power-meter.entity';
import { PowerEventType } from '../src/entities/power-event.entity';
import { createPowerTestingModule, PowerTestContext, T0 } from './utils/power-testing-module';

describe('PowerStoreService', () => {
  let ctx: PowerTestContext;

  beforeEach(async () => {
    ctx = await createPowerTestingModule();
  });

  afterEach(async () => {
    await ctx.moduleRef.close();
  });

  const reading = (meterId: string, timestamp: string, chargePct: number) => ({
    meterId,
    voltage: 12,
    currentDraw: 1,
    wattage: 12,
    chargePct,
    timestamp,
  });

  describe('foreign keys', () => {
    it('should reject a reading for a missing meter', async () => {
      await expect(
        ctx.store.transaction((manager) =>
          ctx.store.insertReading(manager, reading('missing', T0.toISOString(), 50)),
        ),
      ).rejects.toThrow(QueryFailedError);
    });

    it('should reject an event for a missing device', async () => {
      await expect(
        ctx.store.transaction((manager) =>
          ctx.store.insertEvent(manager, {
            deviceId: 'ghost',
            type: PowerEventType.SHUTDOWN,
            value: 0,
            timestamp: T0.toISOString(),
          }),
        ),
      ).rejects.toThrow('FOREIGN KEY constraint failed');
    });
  });

  describe('transaction', () => {
    it('should roll back every write when the work throws', async () => {
      await expect(
        ctx.store.transaction(async (manager) => {
          await ctx.store.upsertDevice(manager, { id: 'dev-rb', name: 'Rollback' });
          throw new Error('abort');
        }),
      ).rejects.toThrow('abort');

      const found = await ctx.store.read((manager) =>
        manager.findOneBy(Device, { id: 'dev-rb' }),
      );
      expect(found).toBeNull();
    });

    it('should keep serving calls after a failed one', async () => {
      const failed = ctx.store.transaction(async () => {
        throw new Error('first');
      });
      const next = ctx.store.transaction((manager) =>
        ctx.store.upsertDevice(manager, { id: 'dev-ok', name: 'Ok' }),
      );

      await expect(failed).rejects.toThrow('first');
      await expect(next).resolves.toMatchObject({ id: 'dev-ok' });
    });
  });

  describe('queries', () => {
    it('should order readings by timestamp, then insertion', async () => {
      const meterId = await ctx.store.transaction(async (manager) => {
        await ctx.store.upsertDevice(manager, { id: 'dev-001', name: 'Edge Node' });
        const meter = await ctx.store.insertMeter(manager, {
          deviceId: 'dev-001',
          type: MeterType.BATTERY,
          capacityWh: 50,
        });
        await ctx.store.insertReading(manager, reading(meter.id, '2026-10-19T11:00:00.000Z', 3));
        await ctx.store.insertReading(manager, reading(meter.id, '2026-10-19T10:00:00.000Z', 1));
        await ctx.store.insertReading(manager, reading(meter.id, '2026-10-19T11:00:00.000Z', 4));
        await ctx.store.insertReading(manager, reading(meter.id, '2026-10-19T10:30:00.000Z', 2));
        return meter.id;
      });

      const readings = await ctx.store.read((manager) =>
        ctx.store.listReadingsForMeterSince(manager, meterId, '2026-10-19T10:30:00.000Z'),
      );

      expect(readings.map((r) => r.chargePct)).toEqual([2, 3, 4]);
    });

    it('should limit events and order them newest first', async () => {
      await ctx.store.transaction(async (manager) => {
        await ctx.store.upsertDevice(manager, { id: 'dev-001', name: 'Edge Node' });
        for (const [value, timestamp] of [
          [1, '2026-10-19T09:00:00.000Z'],
          [2, '2026-10-19T11:00:00.000Z'],
          [3, '2026-10-19T10:00:00.000Z'],
        ] as const) {
          await ctx.store.insertEvent(manager, {
            deviceId: 'dev-001',
            type: PowerEventType.RESTORE,
            value,
            timestamp,
          });
        }
      });

      const events = await ctx.store.read((manager) =>
        ctx.store.listEventsForDevice(manager, 'dev-001', 2),
      );

      expect(events.map((e) => e.value)).toEqual([2, 3]);
    });
  });
});
