import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import type BetterSqlite3 from 'better-sqlite3';
import { Device } from '../entities/device.entity';
import { PowerMeter } from '../entities/power-meter.entity';
import { PowerReading } from '../entities/power-reading.entity';
import { PowerEvent } from '../entities/power-event.entity';
import { InitPowerSchema1760870400000 } from '../migrations/1760870400000-InitPowerSchema';

export const DEFAULT_DB_PATH = 'power_manager.db';

export const POWER_ENTITIES = [Device, PowerMeter, PowerReading, PowerEvent];
export const POWER_MIGRATIONS = [InitPowerSchema1760870400000];

export const buildDataSourceOptions = (
  database: string,
  logging = false,
): DataSourceOptions => ({
  type: 'better-sqlite3',
  database,
  entities: POWER_ENTITIES,
  migrations: POWER_MIGRATIONS,
  migrationsRun: true,
  synchronize: false, // Schema comes from migrations only
  logging,
  enableWAL: true,
  prepareDatabase: (db: BetterSqlite3.Database) => {
    // A committed reading must survive a crash, so fsync on every commit
    db.pragma('synchronous = FULL');
    db.pragma('foreign_keys = ON');
  },
});

export const getDatabaseConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions =>
  buildDataSourceOptions(
    configService.get<string>('DB_PATH', DEFAULT_DB_PATH),
    configService.get<string>('NODE_ENV') === 'development',
  );
