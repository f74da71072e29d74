import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

export enum PowerEventType {
  CHARGE_START = 'charge_start',
  DISCHARGE = 'discharge',
  LOW_BATTERY = 'low_battery',
  SHUTDOWN = 'shutdown',
  RESTORE = 'restore',
}

@Entity('power_events')
export class PowerEvent {
  @PrimaryGeneratedColumn('increment', { name: 'id' })
  id!: number;

  @Column({ name: 'device_id', type: 'varchar', length: 64 })
  deviceId!: string;

  @Column({ name: 'type', type: 'varchar', length: 16 })
  type!: PowerEventType;

  @Column({ name: 'value', type: 'real', default: 0 })
  value!: number;

  @Column({ name: 'timestamp', type: 'varchar', length: 32 })
  timestamp!: string;

  @Column({ name: 'note', type: 'varchar', nullable: true })
  note!: string | null;
}
