import { ByteReader } from '../protocol/byteReader';
import { decodeBCD, decodeCoordinate, decodeDate, decodeHundredths, decodeTime } from '../protocol/codec';
import { DeviceStatus, IgnitionStatus, ParseError, StatusReport } from '../types/protocol';
import { PREFIX_LENGTH, readPrefix, truncated } from './reportPrefix';

// Prefix plus the message-type flag; everything after it is optional.
export const STATUS_MIN_LENGTH = PREFIX_LENGTH + 1;
export const STATUS_FULL_LENGTH = 58;

export const VOLTAGE_MIN_MV = 10000;
export const VOLTAGE_MAX_MV = 20000;

const FIX_STATUS: Record<number, string> = { 0: 'Not Fixed', 1: 'Fixed', 3: 'DR Activated' };
const DEVICE_MODE: Record<number, string> = { 1: 'Driving', 5: 'Deactivate Zone' };

const IGNITION_INPUT_BIT = 0x01;

/** Voltages outside 10-20 V mean the field was read from the wrong offset. */
export const acceptVoltage = (millivolts: number | null): number | null => {
  if (millivolts === null) return null;
  return millivolts >= VOLTAGE_MIN_MV && millivolts <= VOLTAGE_MAX_MV ? millivolts : null;
};

export class StatusParser {
  // STT layout: prefix(15) msgType(1) date(3) time(3) cellId(4) mcc(2) mnc(2)
  // lac(2) rx(1) lat(4) lon(4) spd(2) crs(2) satt(1) fix(1) in(1) out(1)
  // mode(1) rptType(1) msgNum(2) reserved(1) assignMap(4) = 58 bytes
  static parse(frame: Buffer, receivedAt: string): StatusReport | ParseError {
    if (frame.length < STATUS_MIN_LENGTH) {
      return truncated(frame, receivedAt, 'STT message', STATUS_MIN_LENGTH);
    }

    const reader = new ByteReader(frame);
    const prefix = readPrefix(reader);
    const messageType = reader.u8() === 1 ? 'Real Time' : 'Stored';

    const date = reader.field(3, decodeDate);
    const time = reader.field(3, decodeTime);

    const cellId = reader.u32() ?? 0;
    const mcc = reader.field(2, decodeBCD) ?? 0;
    const mnc = reader.field(2, decodeBCD) ?? 0;
    const lac = reader.u16() ?? 0;
    const rxLevel = reader.u8() ?? 0;

    const latitude = reader.field(4, decodeCoordinate) ?? 0;
    const longitude = reader.field(4, decodeCoordinate) ?? 0;
    const speedKmh = reader.field(2, decodeHundredths) ?? 0;
    const courseDeg = reader.field(2, decodeHundredths) ?? 0;
    const satellites = reader.u8() ?? 0;
    const fixStatusCode = reader.u8() ?? 0;

    const inputState = reader.u8();
    const outputState = reader.u8() ?? 0;
    const deviceModeCode = reader.u8() ?? 0;
    const reportTypeId = reader.u8() ?? 0;
    const messageNumber = reader.u16() ?? 0;
    reader.take(1); // reserved
    const assignMap = reader.u32() ?? 0;

    // First custom field after the fixed block: external power in mV.
    const inputVoltageMv = acceptVoltage(reader.u16());

    const status: DeviceStatus = {
      inputState: inputState ?? 0,
      outputState,
      ignition: inputState === null ? null : StatusParser.ignitionFrom(inputState),
      deviceMode: DEVICE_MODE[deviceModeCode] ?? String(deviceModeCode),
      deviceModeCode,
      reportTypeId,
      messageNumber,
      inputVoltageMv
    };

    return {
      kind: 'status',
      receivedAt,
      ...prefix,
      messageType,
      gpsTimestamp: date !== null && time !== null ? `${date} ${time}` : null,
      gps: {
        latitude,
        longitude,
        speedKmh,
        courseDeg,
        satellites,
        fixStatus: FIX_STATUS[fixStatusCode] ?? String(fixStatusCode),
        fixStatusCode
      },
      cellular: {
        cellId: cellId.toString(16).toUpperCase().padStart(8, '0'),
        mcc,
        mnc,
        lac: lac.toString(16).toUpperCase().padStart(4, '0'),
        rxLevel
      },
      status,
      assignMap,
      rawTrailingDataLength: Math.max(0, frame.length - STATUS_FULL_LENGTH),
      raw: frame
    };
  }

  static ignitionFrom(inputState: number): IgnitionStatus {
    return (inputState & IGNITION_INPUT_BIT) !== 0 ? 'ON' : 'OFF';
  }
}
