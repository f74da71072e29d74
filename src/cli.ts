#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { AnalyticsService } from './services/analytics.service';
import { parseReportArgs } from './report-args';

const USAGE = `Usage: power-report report <deviceId> [--days N]

Prints a JSON power report for a device over the last N days (default 7).
`;

async function run(argv: string[]): Promise<void> {
  const command = parseReportArgs(argv);
  if (command === null) {
    process.stdout.write(USAGE);
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  try {
    const report = await app.get(AnalyticsService).exportReport(command.deviceId, command.days);
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } finally {
    await app.close();
  }
}

run(process.argv.slice(2)).catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger('PowerReport').error(err.message);
  process.exitCode = 1;
});
