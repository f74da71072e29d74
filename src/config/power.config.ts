import { ConfigType, registerAs } from '@nestjs/config';
import { DEFAULT_POWER_THRESHOLDS } from '../domain/power-state';

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid configuration: ${name}="${raw}" is not a number`);
  }
  return value;
}

/**
 * Engine settings, injected into the telemetry and analytics services.
 */
export const powerConfig = registerAs('power', () => ({
  thresholds: {
    criticalBatteryPct: readNumber(
      'CRITICAL_BATTERY_PCT',
      DEFAULT_POWER_THRESHOLDS.criticalBatteryPct,
    ),
    lowBatteryPct: readNumber(
      'LOW_BATTERY_PCT',
      DEFAULT_POWER_THRESHOLDS.lowBatteryPct,
    ),
    chargingPct: readNumber('CHARGING_PCT', DEFAULT_POWER_THRESHOLDS.chargingPct),
  },
  eventsDefaultLimit: readNumber('EVENTS_DEFAULT_LIMIT', 50),
  historyDefaultHours: readNumber('HISTORY_DEFAULT_HOURS', 24),
  reportDefaultDays: readNumber('REPORT_DEFAULT_DAYS', 7),
  reportEventWindow: readNumber('REPORT_EVENT_WINDOW', 200),
  reportEmbeddedEvents: readNumber('REPORT_EMBEDDED_EVENTS', 20),
}));

export type PowerConfig = ConfigType<typeof powerConfig>;
