import { Entity, Column, PrimaryGeneratedColumn, Index } from 'typeorm';

export enum MeterType {
  MAIN = 'main',
  BATTERY = 'battery',
  SOLAR = 'solar',
  UPS = 'ups',
}

@Entity('power_meters')
export class PowerMeter {
  // Creation order. Listings sort on it so "first battery meter" is stable.
  @PrimaryGeneratedColumn('increment', { name: 'seq' })
  seq!: number;

  @Index('idx_meters_id', { unique: true })
  @Column({ name: 'id', type: 'varchar', length: 36 })
  id!: string;

  @Column({ name: 'device_id', type: 'varchar', length: 64 })
  deviceId!: string;

  @Column({ name: 'type', type: 'varchar', length: 16 })
  type!: MeterType;

  @Column({ name: 'voltage', type: 'real', default: 0 })
  voltage!: number;

  @Column({ name: 'current_draw', type: 'real', default: 0 })
  currentDraw!: number;

  @Column({ name: 'capacity_wh', type: 'real', default: 0 })
  capacityWh!: number;

  @Column({ name: 'charge_pct', type: 'real', default: 100 })
  chargePct!: number;

  @Column({ name: 'name', type: 'varchar', nullable: true })
  name!: string | null;
}
