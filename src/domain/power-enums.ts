import { MeterType } from '../entities/power-meter.entity';
import { PowerEventType } from '../entities/power-event.entity';
import { InvalidEnumException } from '../common/power.exceptions';

export const METER_TYPES: readonly MeterType[] = Object.values(MeterType);
export const POWER_EVENT_TYPES: readonly PowerEventType[] =
  Object.values(PowerEventType);

export function parseMeterType(value: string): MeterType {
  const type = METER_TYPES.find((candidate) => candidate === value);
  if (type === undefined) {
    throw new InvalidEnumException('meter type', value, METER_TYPES);
  }
  return type;
}

export function parsePowerEventType(value: string): PowerEventType {
  const type = POWER_EVENT_TYPES.find((candidate) => candidate === value);
  if (type === undefined) {
    throw new InvalidEnumException('event type', value, POWER_EVENT_TYPES);
  }
  return type;
}
