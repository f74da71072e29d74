import { Entity, Column, PrimaryColumn } from 'typeorm';

export const DEFAULT_SHUTDOWN_THRESHOLD = 3.0;

@Entity('devices')
export class Device {
  @PrimaryColumn({ name: 'id', type: 'varchar', length: 64 })
  id!: string;

  @Column({ name: 'name', type: 'varchar' })
  name!: string;

  @Column({
    name: 'shutdown_threshold',
    type: 'real',
    default: DEFAULT_SHUTDOWN_THRESHOLD,
  })
  shutdownThreshold!: number;

  @Column({ name: 'target_wh', type: 'real', nullable: true })
  targetWh!: number | null;
}
