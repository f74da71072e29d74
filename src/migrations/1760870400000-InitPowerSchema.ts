import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitPowerSchema1760870400000 implements MigrationInterface {
  name = 'InitPowerSchema1760870400000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "devices" (
        "id" varchar(64) PRIMARY KEY NOT NULL,
        "name" varchar NOT NULL,
        "shutdown_threshold" real NOT NULL DEFAULT (3.0),
        "target_wh" real
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "power_meters" (
        "seq" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "id" varchar(36) NOT NULL,
        "device_id" varchar(64) NOT NULL,
        "type" varchar(16) NOT NULL
          CHECK ("type" IN ('main', 'battery', 'solar', 'ups')),
        "voltage" real NOT NULL DEFAULT (0),
        "current_draw" real NOT NULL DEFAULT (0),
        "capacity_wh" real NOT NULL DEFAULT (0),
        "charge_pct" real NOT NULL DEFAULT (100)
          CHECK ("charge_pct" BETWEEN 0 AND 100),
        "name" varchar,
        CONSTRAINT "fk_power_meters_device" FOREIGN KEY ("device_id")
          REFERENCES "devices" ("id")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "idx_meters_id" ON "power_meters" ("id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "idx_meters_device" ON "power_meters" ("device_id", "seq")`,
    );

    // Append-only history: readings per meter, queried by time window
    await queryRunner.query(`
      CREATE TABLE "power_readings" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "meter_id" varchar(36) NOT NULL,
        "voltage" real NOT NULL,
        "current_draw" real NOT NULL,
        "wattage" real NOT NULL,
        "charge_pct" real NOT NULL
          CHECK ("charge_pct" BETWEEN 0 AND 100),
        "timestamp" varchar(32) NOT NULL,
        CONSTRAINT "fk_power_readings_meter" FOREIGN KEY ("meter_id")
          REFERENCES "power_meters" ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "idx_readings_meter" ON "power_readings" ("meter_id", "timestamp")`,
    );

    await queryRunner.query(`
      CREATE TABLE "power_events" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "device_id" varchar(64) NOT NULL,
        "type" varchar(16) NOT NULL
          CHECK ("type" IN ('charge_start', 'discharge', 'low_battery', 'shutdown', 'restore')),
        "value" real NOT NULL DEFAULT (0),
        "timestamp" varchar(32) NOT NULL,
        "note" varchar,
        CONSTRAINT "fk_power_events_device" FOREIGN KEY ("device_id")
          REFERENCES "devices" ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "idx_events_device" ON "power_events" ("device_id", "timestamp")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_events_device"`);
    await queryRunner.query(`DROP TABLE "power_events"`);
    await queryRunner.query(`DROP INDEX "idx_readings_meter"`);
    await queryRunner.query(`DROP TABLE "power_readings"`);
    await queryRunner.query(`DROP INDEX "idx_meters_device"`);
    await queryRunner.query(`DROP INDEX "idx_meters_id"`);
    await queryRunner.query(`DROP TABLE "power_meters"`);
    await queryRunner.query(`DROP TABLE "devices"`);
  }
}
