import { parseArgs } from 'util';

export interface ReportCommand {
  deviceId: string;
  days?: number;
}

/**
 * Parses `report <deviceId> [--days N]`. Returns null for anything that is
 * not a report invocation; throws when `--days` is not a whole number.
 */
export function parseReportArgs(argv: string[]): ReportCommand | null {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { days: { type: 'string' } },
  });
  const [command, deviceId] = positionals;

  if (command !== 'report' || deviceId === undefined) {
    return null;
  }
  if (values.days === undefined) {
    return { deviceId };
  }
  if (!/^\d+$/.test(values.days)) {
    throw new Error(`--days must be a whole number, got "${values.days}"`);
  }
  return { deviceId, days: Number.parseInt(values.days, 10) };
}
