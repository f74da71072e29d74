import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One telemetry sample. Append-only: rows are never updated after insert.
 */
@Entity('power_readings')
export class PowerReading {
  @PrimaryGeneratedColumn('increment', { name: 'id' })
  id!: number;

  @Column({ name: 'meter_id', type: 'varchar', length: 36 })
  meterId!: string;

  @Column({ name: 'voltage', type: 'real' })
  voltage!: number;

  @Column({ name: 'current_draw', type: 'real' })
  currentDraw!: number;

  @Column({ name: 'wattage', type: 'real' })
  wattage!: number;

  @Column({ name: 'charge_pct', type: 'real' })
  chargePct!: number;

  /** ISO-8601 UTC, as produced by `Date#toISOString`. */
  @Column({ name: 'timestamp', type: 'varchar', length: 32 })
  timestamp!: string;
}
