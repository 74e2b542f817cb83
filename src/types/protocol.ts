// Tracker binary protocol: status (STT) and BLE scan (BDA/SNB) report types

export enum FrameHeader {
  STATUS = 0x81,
  STATUS_VARIANT = 0x82,
  BLE_SCAN = 0xAA,
  BLE_SCAN_ACK = 0xBA
}

export type IgnitionStatus = 'ON' | 'OFF';

export type MacOrientation = 'big' | 'little';

export type DecodeErrorKind =
  | 'EmptyFrame'
  | 'UnknownHeader'
  | 'TruncatedRequiredField'
  | 'InvalidSensorLayout'
  | 'DecodeFailure';

export interface GpsFix {
  latitude: number;
  longitude: number;
  speedKmh: number;
  courseDeg: number;
  satellites: number;
  fixStatus: string;      // 'Not Fixed' | 'Fixed' | 'DR Activated' | raw code
  fixStatusCode: number;
}

export interface CellInfo {
  cellId: string;         // 8 hex digits
  mcc: number;
  mnc: number;
  lac: string;            // 4 hex digits
  rxLevel: number;
}

export interface DeviceStatus {
  inputState: number;
  outputState: number;
  ignition: IgnitionStatus | null;
  deviceMode: string;     // 'Driving' | 'Deactivate Zone' | raw code
  deviceModeCode: number;
  reportTypeId: number;
  messageNumber: number;
  inputVoltageMv: number | null;
}

export interface ReportPrefix {
  header: number;
  headerLabel: string;
  packetLength: number;
  deviceId: number;
  reportMap: number;
  model: number;
  softwareVersion: string;
}

export interface StatusReport extends ReportPrefix {
  kind: 'status';
  receivedAt: string;
  messageType: 'Real Time' | 'Stored';
  gpsTimestamp: string | null;
  gps: GpsFix;
  cellular: CellInfo;
  status: DeviceStatus;
  assignMap: number;
  rawTrailingDataLength: number;
  raw: Buffer;
}

export interface ScanLocation {
  latitude: number;
  longitude: number;
}

export interface SensorSighting {
  macAddress: string;     // AA:BB:CC:DD:EE:FF
  macEndianness: MacOrientation;
  rssi: number | null;
  rssiHex: string | null;
  isTarget: boolean;
  source: 'structured' | 'scan';
  bytePosition: number | null;
  rawPayload: Buffer | null;
  batteryLevel: number | null;
}

export interface BeaconScanReport extends ReportPrefix {
  kind: 'beaconScan';
  receivedAt: string;
  requiresAck: boolean;
  scanStatus: 'Scan Performed' | 'No Scan';
  totalReportsExpected: number;
  currentReportNumber: number;
  expectedSensorCount: number;
  scanTimestamp: string | null;
  scanLocation: ScanLocation | null;
  sensorDataOffset: number;
  remainingPayloadBytes: number;
  sensors: SensorSighting[];
  sensorsParsed: number;
  hasTargetMac: boolean;
  sensorLayoutIssue: string | null;
  raw: Buffer;
}

export interface ParseError {
  kind: 'parseError';
  receivedAt: string;
  errorKind: DecodeErrorKind;
  reason: string;
  byteLength: number;
  raw: Buffer;
}

export interface UnknownHeader {
  kind: 'unknownHeader';
  receivedAt: string;
  headerByte: number;
  label: string | null;
  reason: string;
  raw: Buffer;
}

export type DecodedReport = StatusReport | BeaconScanReport | ParseError | UnknownHeader;

interface BeaconEventBase {
  timestamp: string;
  deviceId: number | null;
  ignitionStatus: IgnitionStatus;
  latitude: number | null;
  longitude: number | null;
  inputVoltageMv: number | null;
}

export interface BeaconSightingEvent extends BeaconEventBase {
  isIgnitionChange: false;
  macId: string;
  frequencySeconds: number | null;
  sensorCountInMessage: number;
  rssi: number | null;
  batteryLevel: number | null;
}

export interface IgnitionChangeEvent extends BeaconEventBase {
  isIgnitionChange: true;
  macId: typeof IGNITION_CHANGE_MARKER;
  previousStatus: IgnitionStatus;
  newStatus: IgnitionStatus;
}

export type BeaconScanEvent = BeaconSightingEvent | IgnitionChangeEvent;

export const IGNITION_CHANGE_MARKER = 'IGNITION_CHANGE';

export interface DeviceSessionState {
  currentIgnitionStatus: IgnitionStatus;
  previousIgnitionStatus: IgnitionStatus | null;
  currentLatitude: number | null;
  currentLongitude: number | null;
  currentInputVoltageMv: number | null;
  lastSeenByMac: Map<string, Date>;
}
