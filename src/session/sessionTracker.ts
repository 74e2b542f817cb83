import {
  BeaconScanEvent,
  BeaconScanReport,
  BeaconSightingEvent,
  DecodedReport,
  DeviceSessionState,
  IGNITION_CHANGE_MARKER,
  IgnitionChangeEvent,
  StatusReport
} from '../types/protocol';
import { acceptVoltage } from '../tcp/statusParser';

export const DEFAULT_MAX_TRACKED_MACS = 5000;

export function createSessionState(): DeviceSessionState {
  return {
    currentIgnitionStatus: 'OFF',
    previousIgnitionStatus: null,
    currentLatitude: null,
    currentLongitude: null,
    currentInputVoltageMv: null,
    lastSeenByMac: new Map()
  };
}

export function copySessionState(state: DeviceSessionState): DeviceSessionState {
  const lastSeenByMac = new Map<string, Date>();
  for (const [mac, seenAt] of state.lastSeenByMac) {
    lastSeenByMac.set(mac, new Date(seenAt.getTime()));
  }
  return { ...state, lastSeenByMac };
}

/**
 * Folds decoded reports into the session state and derives beacon and
 * ignition-change events. Callers serialize calls to `apply`; it is
 * synchronous and mutates the state object it was given.
 */
export class SessionTracker {
  constructor(
    private readonly state: DeviceSessionState,
    private readonly maxTrackedMacs: number = DEFAULT_MAX_TRACKED_MACS
  ) {}

  apply(report: DecodedReport): BeaconScanEvent[] {
    switch (report.kind) {
      case 'status':
        return this.applyStatus(report);
      case 'beaconScan':
        return this.applyBeaconScan(report);
      default:
        return [];
    }
  }

  private applyStatus(report: StatusReport): IgnitionChangeEvent[] {
    const { gps, status } = report;

    if (gps.latitude !== 0 || gps.longitude !== 0) {
      this.state.currentLatitude = gps.latitude;
      this.state.currentLongitude = gps.longitude;
    }

    const voltage = acceptVoltage(status.inputVoltageMv);
    if (voltage !== null) {
      this.state.currentInputVoltageMv = voltage;
    }

    const ignition = status.ignition;
    if (ignition === null) return [];

    this.state.currentIgnitionStatus = ignition;
    const previous = this.state.previousIgnitionStatus;
    this.state.previousIgnitionStatus = ignition;

    if (previous === null || previous === ignition) return [];

    return [{
      timestamp: report.receivedAt,
      deviceId: report.deviceId,
      isIgnitionChange: true,
      macId: IGNITION_CHANGE_MARKER,
      ignitionStatus: ignition,
      previousStatus: previous,
      newStatus: ignition,
      latitude: this.state.currentLatitude,
      longitude: this.state.currentLongitude,
      inputVoltageMv: this.state.currentInputVoltageMv
    }];
  }

  private applyBeaconScan(report: BeaconScanReport): BeaconSightingEvent[] {
    if (report.sensors.length === 0) return [];

    const seenAt = new Date(report.receivedAt);
    const validTimestamp = !Number.isNaN(seenAt.getTime());
    if (!validTimestamp) {
      console.warn(`[session] unreadable scan timestamp "${report.receivedAt}", frequency unavailable`);
    }

    const latitude = this.state.currentLatitude ?? report.scanLocation?.latitude ?? null;
    const longitude = this.state.currentLongitude ?? report.scanLocation?.longitude ?? null;

    const events: BeaconSightingEvent[] = [];
    for (const sensor of report.sensors) {
      if (!sensor.isTarget) continue;

      let frequencySeconds: number | null = null;
      if (validTimestamp) {
        frequencySeconds = this.frequencySince(sensor.macAddress, seenAt);
        this.recordSighting(sensor.macAddress, seenAt);
      }

      events.push({
        timestamp: report.receivedAt,
        deviceId: report.deviceId,
        isIgnitionChange: false,
        macId: sensor.macAddress,
        ignitionStatus: this.state.currentIgnitionStatus,
        latitude,
        longitude,
        frequencySeconds,
        inputVoltageMv: this.state.currentInputVoltageMv,
        sensorCountInMessage: report.sensors.length,
        rssi: sensor.rssi,
        batteryLevel: sensor.batteryLevel
      });
    }
    return events;
  }

  // Zero or negative gaps come from clock or ordering anomalies.
  private frequencySince(mac: string, seenAt: Date): number | null {
    const previous = this.state.lastSeenByMac.get(mac);
    if (!previous) return null;
    const seconds = (seenAt.getTime() - previous.getTime()) / 1000;
    return seconds > 0 ? seconds : null;
  }

  private recordSighting(mac: string, seenAt: Date): void {
    const seen = this.state.lastSeenByMac;
    seen.delete(mac);
    seen.set(mac, seenAt);

    // Map iteration order is insertion order: the first key is the stalest.
    while (seen.size > this.maxTrackedMacs) {
      const stalest = seen.keys().next();
      if (stalest.done) break;
      seen.delete(stalest.value);
    }
  }
}
