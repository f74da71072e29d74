import { MeterType, PowerMeter } from '../entities/power-meter.entity';
import { PowerEventType } from '../entities/power-event.entity';
import {
  DEFAULT_POWER_THRESHOLDS,
  PowerState,
  PowerThresholds,
} from './power-state';

/** The live fields of a meter that every derived value is computed from. */
export type MeterLiveState = Pick<
  PowerMeter,
  'type' | 'voltage' | 'currentDraw' | 'capacityWh' | 'chargePct'
>;

export type MeterSnapshot = PowerMeter & {
  wattage: number;
  state: PowerState;
};

/**
 * Rounds to `digits` decimals, half to even. `toFixed` already rounds the
 * exact binary value, so only exact ties need handling: those are the values
 * for which `value * 2^(digits + 1)` is an odd integer.
 */
export function roundTo(value: number, digits: number): number {
  const scaled = value * 2 ** (digits + 1);
  const isTie = Number.isInteger(scaled) && Math.abs(scaled % 2) === 1;
  if (!isTie) return parseFloat(value.toFixed(digits));

  const factor = 10 ** digits;
  const lower = Math.floor(value * factor);
  return (lower % 2 === 0 ? lower : lower + 1) / factor;
}

export function calculateWattage(voltage: number, currentDraw: number): number {
  return roundTo(voltage * currentDraw, 4);
}

export function clampChargePct(chargePct: number): number {
  return Math.max(0, Math.min(100, chargePct));
}

/**
 * Classifies a meter's operating state. Rules are checked in order and the
 * first match wins; solar meters report CHARGING whatever their charge.
 */
export function classifyPowerState(
  meter: Pick<MeterLiveState, 'type' | 'chargePct'>,
  thresholds: PowerThresholds = DEFAULT_POWER_THRESHOLDS,
): PowerState {
  if (meter.type === MeterType.SOLAR) return PowerState.CHARGING;
  if (meter.chargePct <= thresholds.criticalBatteryPct) return PowerState.CRITICAL;
  if (meter.chargePct <= thresholds.lowBatteryPct) return PowerState.LOW;
  if (meter.chargePct >= thresholds.chargingPct) return PowerState.CHARGING;
  if (meter.chargePct > thresholds.lowBatteryPct) return PowerState.NORMAL;
  return PowerState.UNKNOWN;
}

/**
 * Event raised by a single reading. Stateless: a battery that stays low emits
 * again on every reading.
 */
export function autoEventForReading(
  meterType: MeterType,
  chargePct: number,
  thresholds: PowerThresholds = DEFAULT_POWER_THRESHOLDS,
): PowerEventType | null {
  if (meterType !== MeterType.BATTERY) return null;
  if (chargePct <= thresholds.criticalBatteryPct) return PowerEventType.LOW_BATTERY;
  if (chargePct <= thresholds.lowBatteryPct) return PowerEventType.DISCHARGE;
  return null;
}

/**
 * Hours left on the first battery meter (in the given order) that is drawing
 * current, or null when there is nothing to estimate from.
 */
export function estimateRuntimeHours(
  meters: readonly MeterLiveState[],
): number | null {
  const battery = meters.find(
    (m) => m.type === MeterType.BATTERY && m.currentDraw > 0,
  );
  if (!battery) return null;

  const remainingWh = battery.capacityWh * (battery.chargePct / 100);
  const wattage = calculateWattage(battery.voltage, battery.currentDraw);
  if (wattage <= 0) return null;

  return roundTo(remainingWh / wattage, 2);
}

export function toMeterSnapshot(
  meter: PowerMeter,
  thresholds: PowerThresholds = DEFAULT_POWER_THRESHOLDS,
): MeterSnapshot {
  return {
    ...meter,
    wattage: calculateWattage(meter.voltage, meter.currentDraw),
    state: classifyPowerState(meter, thresholds),
  };
}
