import { BadRequestException, NotFoundException } from '@nestjs/common';

export class DeviceNotFoundException extends NotFoundException {
  constructor(readonly deviceId: string) {
    super(`Device not found: ${deviceId}`);
  }
}

export class MeterNotFoundException extends NotFoundException {
  constructor(readonly meterId: string) {
    super(`Meter not found: ${meterId}`);
  }
}

/** A meter or event type string that names no known variant. */
export class InvalidEnumException extends BadRequestException {
  constructor(kind: string, value: string, allowed: readonly string[]) {
    super(`Invalid ${kind} '${value}', expected one of: ${allowed.join(', ')}`);
  }
}
