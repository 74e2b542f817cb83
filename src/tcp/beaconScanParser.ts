import { ByteReader } from '../protocol/byteReader';
import { decodeCoordinate, decodeDate, decodeTime, hexByte } from '../protocol/codec';
import { resolveMac, ResolvedMac, TargetPrefixSet } from '../protocol/macResolver';
import { BeaconScanReport, FrameHeader, ParseError, ScanLocation, SensorSighting } from '../types/protocol';
import { PREFIX_LENGTH, readPrefix, truncated } from './reportPrefix';

// Prefix plus scan status(1), total(1), current(1), sensor count(2).
export const BEACON_SCAN_MIN_LENGTH = PREFIX_LENGTH + 5;

const MAC_LENGTH = 6;
const AD_TYPE_SERVICE_DATA_16 = 0x16;
const BATTERY_SERVICE_UUID = 0x180F;

type SightingDetails = Omit<SensorSighting, 'macAddress' | 'macEndianness' | 'isTarget'>;

/** Keeps one sighting per normalized address; the first registration wins. */
class SightingCollector {
  private byKey = new Map<string, SensorSighting>();

  add(mac: ResolvedMac, details: SightingDetails): boolean {
    if (this.byKey.has(mac.key)) return false;
    this.byKey.set(mac.key, {
      macAddress: mac.address,
      macEndianness: mac.orientation,
      isTarget: mac.isTarget,
      ...details
    });
    return true;
  }

  list(): SensorSighting[] {
    return Array.from(this.byKey.values());
  }
}

export class BeaconScanParser {
  // BDA/SNB layout: prefix(15) scanStatus(1) totalNo(1) currNo(1) sensorCnt(2)
  // [date(3) time(3) lat(4) lon(4)] then sensorCnt x
  // { payloadSize(2) payload(payloadSize) mac(6) rssi(1) }
  static parse(frame: Buffer, receivedAt: string, targets: TargetPrefixSet): BeaconScanReport | ParseError {
    if (frame.length < BEACON_SCAN_MIN_LENGTH) {
      return truncated(frame, receivedAt, 'BDA message', BEACON_SCAN_MIN_LENGTH);
    }

    const reader = new ByteReader(frame);
    const prefix = readPrefix(reader);
    const scanStatusFlag = reader.u8() ?? 0;
    const totalReportsExpected = reader.u8() ?? 0;
    const currentReportNumber = reader.u8() ?? 0;
    const expectedSensorCount = reader.u16() ?? 0;

    const scanDate = reader.field(3, decodeDate);
    const scanTime = reader.field(3, decodeTime);
    const scanLatitude = reader.field(4, decodeCoordinate);
    const scanLongitude = reader.field(4, decodeCoordinate);

    const scanLocation: ScanLocation | null =
      scanLatitude !== null && scanLongitude !== null
        ? { latitude: scanLatitude, longitude: scanLongitude }
        : null;

    const sensorDataOffset = reader.offset;
    const remainingPayloadBytes = reader.remaining;

    const collector = new SightingCollector();
    const sensorLayoutIssue = this.readStructuredSensors(reader, expectedSensorCount, targets, collector);
    this.scanForTargets(frame, targets, collector);

    const sensors = collector.list();

    return {
      kind: 'beaconScan',
      receivedAt,
      ...prefix,
      requiresAck: prefix.header === FrameHeader.BLE_SCAN_ACK,
      scanStatus: scanStatusFlag === 1 ? 'Scan Performed' : 'No Scan',
      totalReportsExpected,
      currentReportNumber,
      expectedSensorCount,
      scanTimestamp: scanDate !== null && scanTime !== null ? `${scanDate} ${scanTime}` : null,
      scanLocation,
      sensorDataOffset,
      remainingPayloadBytes,
      sensors,
      sensorsParsed: sensors.length,
      hasTargetMac: sensors.some((sensor) => sensor.isTarget),
      sensorLayoutIssue,
      raw: frame
    };
  }

  /**
   * Structured pass. Returns a description of where the layout broke off,
   * or null when all announced entries were read. Partial entries are dropped.
   */
  private static readStructuredSensors(
    reader: ByteReader,
    expected: number,
    targets: TargetPrefixSet,
    collector: SightingCollector
  ): string | null {
    for (let index = 0; index < expected; index++) {
      const entryStart = reader.offset;
      const size = reader.u16();
      const payload = size === null ? null : reader.take(size);
      const mac = payload === null ? null : reader.take(MAC_LENGTH);
      const rssi = mac === null ? null : reader.field(1, (bytes) => bytes.readInt8(0));

      if (payload === null || mac === null || rssi === null) {
        return `InvalidSensorLayout: entry ${index + 1} of ${expected} incomplete at byte ${entryStart}`;
      }

      collector.add(resolveMac(mac, targets), {
        rssi,
        rssiHex: hexByte(rssi & 0xFF),
        source: 'structured',
        bytePosition: entryStart + 2 + payload.length,
        rawPayload: Buffer.from(payload),
        batteryLevel: this.batteryLevelFrom(payload)
      });
    }
    return null;
  }

  /**
   * Heuristic pass: firmware does not always align beacon records with the
   * structured layout, so every 6-byte window of the whole frame is tested in
   * both byte orders against the target prefixes. Linear in frame length,
   * and frames are a few hundred bytes.
   */
  private static scanForTargets(frame: Buffer, targets: TargetPrefixSet, collector: SightingCollector): void {
    for (let offset = 0; offset + MAC_LENGTH <= frame.length; offset++) {
      const mac = resolveMac(frame.subarray(offset, offset + MAC_LENGTH), targets);
      if (!mac.isTarget) continue;

      const rssiAt = offset + MAC_LENGTH;
      const rssi = rssiAt < frame.length ? frame.readInt8(rssiAt) : null;
      collector.add(mac, {
        rssi,
        rssiHex: rssi === null ? null : hexByte(rssi & 0xFF),
        source: 'scan',
        bytePosition: offset,
        rawPayload: null,
        batteryLevel: null
      });
    }
  }

  /** Battery Service (0x180F) service data, if the advertisement carries it. */
  private static batteryLevelFrom(payload: Buffer): number | null {
    let offset = 0;
    while (offset < payload.length) {
      const length = payload[offset];
      if (length === 0 || offset + 1 + length > payload.length) break;

      const type = payload[offset + 1];
      if (type === AD_TYPE_SERVICE_DATA_16 && length >= 4) {
        const uuid = payload.readUInt16LE(offset + 2);
        if (uuid === BATTERY_SERVICE_UUID) {
          return payload[offset + 4];
        }
      }
      offset += 1 + length;
    }
    return null;
  }
}
