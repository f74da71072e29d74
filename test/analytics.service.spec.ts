import { DeviceNotFoundException, MeterNotFoundException } from '../src/common/power.exceptions';
import { MeterType, PowerMeter } from '../src/entities/power-meter.entity';
import { PowerEventType } from '../src/entities/power-event.entity';
import { PowerState } from '../src/domain/power-state';
import {
  createPowerTestingModule,
  HOUR_MS,
  PowerTestContext,
  T0,
} from './utils/power-testing-module';

describe('AnalyticsService', () => {
  let ctx: PowerTestContext;
  let battery: PowerMeter;

  beforeEach(async () => {
    ctx = await createPowerTestingModule();
    await ctx.devices.registerDevice({ id: 'dev-001', name: 'Edge Node' });
    battery = await ctx.devices.addMeter({
      deviceId: 'dev-001',
      type: 'battery',
      capacityWh: 50,
      name: 'Main Battery',
    });
  });

  afterEach(async () => {
    await ctx.moduleRef.close();
  });

  describe('estimateRuntime', () => {
    it('should estimate hours from remaining charge and draw', async () => {
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 12,
        currentDraw: 2,
        chargePct: 80,
      });

      // 50Wh * 80% = 40Wh remaining at 24W
      expect(await ctx.analytics.estimateRuntime('dev-001')).toBe(1.67);
    });

    it('should return null for a device without battery meters', async () => {
      await ctx.devices.registerDevice({ id: 'dev-z', name: 'No battery device' });
      await ctx.devices.addMeter({ deviceId: 'dev-z', type: 'main' });

      expect(await ctx.analytics.estimateRuntime('dev-z')).toBeNull();
    });

    it('should return null while the battery draws no current', async () => {
      expect(await ctx.analytics.estimateRuntime('dev-001')).toBeNull();
    });

    it('should return null when the battery wattage is zero', async () => {
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 0,
        currentDraw: 2,
        chargePct: 80,
      });

      expect(await ctx.analytics.estimateRuntime('dev-001')).toBeNull();
    });

    it('should use the first battery in creation order', async () => {
      const second = await ctx.devices.addMeter({
        deviceId: 'dev-001',
        type: 'battery',
        capacityWh: 10,
      });
      await ctx.telemetry.logPower({
        meterId: second.id,
        voltage: 12,
        currentDraw: 1,
        chargePct: 50,
      });
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 12,
        currentDraw: 1,
        chargePct: 50,
      });

      // 50Wh * 50% = 25Wh at 12W
      expect(await ctx.analytics.estimateRuntime('dev-001')).toBe(2.08);
    });

    it('should fail with NotFound for an unknown device', async () => {
      await expect(ctx.analytics.estimateRuntime('ghost')).rejects.toThrow(
        DeviceNotFoundException,
      );
    });
  });

  describe('powerBudgetCheck', () => {
    it('should summarize each device', async () => {
      await ctx.devices.addMeter({ deviceId: 'dev-001', type: MeterType.SOLAR });
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 12,
        currentDraw: 1,
        chargePct: 70,
      });

      const result = await ctx.analytics.powerBudgetCheck(['dev-001']);

      expect(result).toEqual({
        'dev-001': {
          totalWattage: 12,
          batteryCount: 1,
          solarCount: 1,
          avgChargePct: 70,
          // 50Wh * 70% = 35Wh at 12W
          estimatedRuntimeHours: 2.92,
          states: [PowerState.NORMAL, PowerState.CHARGING],
        },
      });
    });

    it('should average charge over battery meters only', async () => {
      const second = await ctx.devices.addMeter({
        deviceId: 'dev-001',
        type: 'battery',
        capacityWh: 20,
      });
      const main = await ctx.devices.addMeter({ deviceId: 'dev-001', type: 'main' });
      await ctx.telemetry.logPower({ meterId: battery.id, voltage: 12, currentDraw: 1, chargePct: 70 });
      await ctx.telemetry.logPower({ meterId: second.id, voltage: 12, currentDraw: 0.5, chargePct: 35.5 });
      await ctx.telemetry.logPower({ meterId: main.id, voltage: 230, currentDraw: 0.1, chargePct: 0 });

      const result = await ctx.analytics.powerBudgetCheck(['dev-001']);

      expect(result['dev-001']).toMatchObject({
        totalWattage: 41,
        batteryCount: 2,
        avgChargePct: 52.75,
        states: [PowerState.NORMAL, PowerState.NORMAL, PowerState.CRITICAL],
      });
    });

    it('should report null averages for a device without meters', async () => {
      await ctx.devices.registerDevice({ id: 'dev-empty', name: 'Empty' });

      const result = await ctx.analytics.powerBudgetCheck(['dev-empty']);

      expect(result['dev-empty']).toEqual({
        totalWattage: 0,
        batteryCount: 0,
        solarCount: 0,
        avgChargePct: null,
        estimatedRuntimeHours: null,
        states: [],
      });
    });

    it('should record an error for an unknown id and keep going', async () => {
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 12,
        currentDraw: 1,
        chargePct: 70,
      });

      const result = await ctx.analytics.powerBudgetCheck(['nonexistent', 'dev-001']);

      expect(result['nonexistent']).toEqual({ error: 'Device not found: nonexistent' });
      expect(result['dev-001']).toMatchObject({ totalWattage: 12, batteryCount: 1 });
    });

    it('should keep an entry for every requested id, whatever its name', async () => {
      await ctx.devices.registerDevice({ id: '__proto__', name: 'Odd id' });

      const result = await ctx.analytics.powerBudgetCheck(['__proto__', 'dev-x']);

      expect(Object.keys(result)).toEqual(['__proto__', 'dev-x']);
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
      expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toEqual({
        totalWattage: 0,
        batteryCount: 0,
        solarCount: 0,
        avgChargePct: null,
        estimatedRuntimeHours: null,
        states: [],
      });
      expect(result['dev-x']).toEqual({ error: 'Device not found: dev-x' });
    });
  });

  describe('getHistory', () => {
    const logAt = async (hoursAgo: number, chargePct: number) => {
      ctx.clock.set(new Date(T0.getTime() - hoursAgo * HOUR_MS));
      await ctx.telemetry.logPower({
        meterId: battery.id,
        voltage: 12,
        currentDraw: 1,
        chargePct,
      });
    };

    beforeEach(async () => {
      await logAt(30, 90);
      await logAt(2, 85);
      await logAt(1, 80);
      ctx.clock.set(T0);
    });

    it('should return readings inside the window, oldest first', async () => {
      const history = await ctx.analytics.getHistory(battery.id, 24);

      expect(history.map((r) => r.chargePct)).toEqual([85, 80]);
      expect(history.map((r) => r.timestamp)).toEqual([
        '2026-10-19T10:00:00.000Z',
        '2026-10-19T11:00:00.000Z',
      ]);
    });

    it('should include a reading exactly at the window start', async () => {
      const history = await ctx.analytics.getHistory(battery.id, 1);

      expect(history.map((r) => r.chargePct)).toEqual([80]);
    });

    it('should default to the last 24 hours', async () => {
      expect(await ctx.analytics.getHistory(battery.id)).toHaveLength(2);
    });

    it('should fail with NotFound for an unknown meter', async () => {
      await expect(ctx.analytics.getHistory('missing', 24)).rejects.toThrow(
        MeterNotFoundException,
      );
    });
  });

  describe('exportReport', () => {
    it('should aggregate readings per meter', async () => {
      const main = await ctx.devices.addMeter({ deviceId: 'dev-001', type: 'main' });

      ctx.clock.set(new Date(T0.getTime() - 48 * HOUR_MS));
      await ctx.telemetry.logPower({ meterId: battery.id, voltage: 12, currentDraw: 5, chargePct: 30 });
      ctx.clock.set(new Date(T0.getTime() - 2 * HOUR_MS));
      await ctx.telemetry.logPower({ meterId: battery.id, voltage: 12, currentDraw: 1.5, chargePct: 75 });
      ctx.clock.set(new Date(T0.getTime() - 1 * HOUR_MS));
      await ctx.telemetry.logPower({ meterId: battery.id, voltage: 12, currentDraw: 2, chargePct: 60 });
      ctx.clock.set(T0);

      const report = await ctx.analytics.exportReport('dev-001', 1);

      expect(report).toEqual({
        deviceId: 'dev-001',
        periodDays: 1,
        generatedAt: T0.toISOString(),
        meters: [
          {
            meterId: battery.id,
            type: MeterType.BATTERY,
            currentState: PowerState.NORMAL,
            avgWattage: 21,
            maxWattage: 24,
            minChargePct: 60,
            readingCount: 2,
          },
          { meterId: main.id, type: MeterType.MAIN, readingCount: 0 },
        ],
        eventCount: 0,
        events: [],
      });
    });

    it('should embed the 20 most recent events and count the fetched window', async () => {
      for (let value = 1; value <= 25; value += 1) {
        await ctx.telemetry.triggerEvent({ deviceId: 'dev-001', type: 'charge_start', value });
      }

      const report = await ctx.analytics.exportReport('dev-001');

      expect(report.periodDays).toBe(7);
      expect(report.eventCount).toBe(25);
      expect(report.events).toHaveLength(20);
      expect(report.events[0].value).toBe(25);
      expect(report.events[19].value).toBe(6);
      expect(report.events[0].type).toBe(PowerEventType.CHARGE_START);
    });

    it('should count at most the 200 most recent events', async () => {
      for (let value = 1; value <= 205; value += 1) {
        await ctx.telemetry.triggerEvent({ deviceId: 'dev-001', type: 'restore', value });
      }

      const report = await ctx.analytics.exportReport('dev-001');

      expect(report.eventCount).toBe(200);
      expect(report.events).toHaveLength(20);
      expect(report.events[0].value).toBe(205);
      expect(report.events[19].value).toBe(186);
    });

    it('should serialize to JSON', async () => {
      await ctx.telemetry.logPower({ meterId: battery.id, voltage: 12, currentDraw: 1.5, chargePct: 75 });

      const parsed = JSON.parse(JSON.stringify(await ctx.analytics.exportReport('dev-001', 1)));

      expect(parsed.deviceId).toBe('dev-001');
      expect(parsed.meters).toHaveLength(1);
      expect(parsed.meters[0].avgWattage).toBe(18);
    });

    it('should fail with NotFound for an unknown device', async () => {
      await expect(ctx.analytics.exportReport('ghost', 1)).rejects.toThrow(
        DeviceNotFoundException,
      );
    });
  });
});
