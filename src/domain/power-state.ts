export enum PowerState {
  NORMAL = 'normal',
  LOW = 'low',
  CRITICAL = 'critical',
  CHARGING = 'charging',
  UNKNOWN = 'unknown',
}

/** Charge levels (percent) that drive state classification and auto events. */
export interface PowerThresholds {
  criticalBatteryPct: number;
  lowBatteryPct: number;
  chargingPct: number;
}

export const DEFAULT_POWER_THRESHOLDS: Readonly<PowerThresholds> = {
  criticalBatteryPct: 5.0,
  lowBatteryPct: 20.0,
  chargingPct: 95.0,
};
