import * as fs from 'fs';
import * as path from 'path';
import { BeaconEventSink } from '../session/sessionContext';
import { BeaconScanEvent } from '../types/protocol';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const FILE_PATTERN = /^beacon-scans-(\d{4}-\d{2}-\d{2})\.ndjson$/;

const isBeaconScanEvent = (value: unknown): value is BeaconScanEvent => {
  if (typeof value !== 'object' || value === null) return false;
  return 'timestamp' in value && typeof value.timestamp === 'string'
    && 'macId' in value && typeof value.macId === 'string'
    && 'isIgnitionChange' in value && typeof value.isIgnitionChange === 'boolean';
};

/** Appends events as NDJSON, one file per UTC calendar day. */
export class DailyEventLog implements BeaconEventSink {
  readonly name = 'daily-event-log';

  constructor(private readonly dirPath: string) {}

  static isDay(day: string): boolean {
    return DAY_PATTERN.test(day);
  }

  fileFor(day: string): string {
    return path.join(this.dirPath, `beacon-scans-${day}.ndjson`);
  }

  write(event: BeaconScanEvent): void {
    const parsed = new Date(event.timestamp);
    const day = Number.isNaN(parsed.getTime())
      ? new Date().toISOString().slice(0, 10)
      : parsed.toISOString().slice(0, 10);

    this.ensureReady();
    fs.appendFileSync(this.fileFor(day), `${JSON.stringify(event)}\n`, 'utf8');
  }

  listDays(): string[] {
    if (!fs.existsSync(this.dirPath)) return [];
    return fs
      .readdirSync(this.dirPath)
      .map((file) => FILE_PATTERN.exec(file)?.[1])
      .filter((day): day is string => day !== undefined)
      .sort();
  }

  /** Events logged on `day`, or null when there is no log for it. */
  readDay(day: string): BeaconScanEvent[] | null {
    if (!DailyEventLog.isDay(day)) return null;
    const file = this.fileFor(day);
    if (!fs.existsSync(file)) return null;

    const events: BeaconScanEvent[] = [];
    const lines = fs.readFileSync(file, 'utf8').split('\n');
    for (const line of lines) {
      if (!line.trim()) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        value = null;
      }
      if (isBeaconScanEvent(value)) {
        events.push(value);
      } else {
        console.warn(`[event-log] skipping malformed line in ${path.basename(file)}`);
      }
    }
    return events;
  }

  private ensureReady(): void {
    if (!fs.existsSync(this.dirPath)) {
      fs.mkdirSync(this.dirPath, { recursive: true });
    }
  }
}
