import { BoundedHistory } from '../storage/boundedHistory';
import { BeaconScanEvent, DecodedReport, DeviceSessionState } from '../types/protocol';
import { copySessionState, createSessionState, DEFAULT_MAX_TRACKED_MACS, SessionTracker } from './sessionTracker';

export interface BeaconEventSink {
  readonly name: string;
  write(event: BeaconScanEvent): void;
}

export interface SessionContextOptions {
  rawReportCapacity?: number;
  beaconEventCapacity?: number;
  maxTrackedMacs?: number;
}

/**
 * Shared aggregation state for every connection: the two history stores and
 * the device session. `commit` is the single critical section. It is fully
 * synchronous, so on the event loop no other connection can observe a report
 * appended without its session update, and shutdown never lands mid-commit.
 */
export class SessionContext {
  readonly rawReports: BoundedHistory<DecodedReport>;
  readonly beaconEvents: BoundedHistory<BeaconScanEvent>;
  private readonly state: DeviceSessionState = createSessionState();
  private readonly tracker: SessionTracker;
  private sinks: BeaconEventSink[] = [];

  constructor(options: SessionContextOptions = {}) {
    this.rawReports = new BoundedHistory(options.rawReportCapacity ?? 1000);
    this.beaconEvents = new BoundedHistory(options.beaconEventCapacity ?? 10000);
    this.tracker = new SessionTracker(this.state, options.maxTrackedMacs ?? DEFAULT_MAX_TRACKED_MACS);
  }

  addSink(sink: BeaconEventSink): void {
    this.sinks.push(sink);
  }

  commit(report: DecodedReport): BeaconScanEvent[] {
    this.rawReports.append(report);
    const events = this.tracker.apply(report);
    for (const event of events) {
      this.beaconEvents.append(event);
    }

    this.forward(events);
    return events;
  }

  snapshotReports(): DecodedReport[] {
    return this.rawReports.snapshot();
  }

  snapshotEvents(): BeaconScanEvent[] {
    return this.beaconEvents.snapshot();
  }

  currentSessionState(): DeviceSessionState {
    return copySessionState(this.state);
  }

  // Sinks are best effort: a failing sink never undoes a commit.
  private forward(events: BeaconScanEvent[]): void {
    for (const event of events) {
      for (const sink of this.sinks) {
        try {
          sink.write(event);
        } catch (error) {
          console.error(`[session] sink ${sink.name} failed:`, error);
        }
      }
    }
  }
}
