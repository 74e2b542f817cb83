import { ByteReader } from '../protocol/byteReader';
import { decodeBCD, decodeSoftwareVersion, hexByte } from '../protocol/codec';
import { FrameHeader, ParseError, ReportPrefix } from '../types/protocol';

// header(1) + length(2) + device id(5) + report map(3) + model(1) + sw version(3)
export const PREFIX_LENGTH = 15;

export const headerLabel = (header: number): string => {
  const ack = header === FrameHeader.BLE_SCAN_ACK ? 'ACK required' : 'No ACK required';
  return `${hexByte(header)} (${ack})`;
};

/** Reads the prefix shared by every report type. Caller checks length first. */
export function readPrefix(reader: ByteReader): ReportPrefix {
  const header = reader.u8() ?? 0;
  return {
    header,
    headerLabel: headerLabel(header),
    packetLength: reader.u16() ?? 0,
    deviceId: reader.field(5, decodeBCD) ?? 0,
    reportMap: reader.u24() ?? 0,
    model: reader.u8() ?? 0,
    softwareVersion: reader.field(3, decodeSoftwareVersion) ?? '0.0.0000'
  };
}

export function truncated(frame: Buffer, receivedAt: string, what: string, required: number): ParseError {
  return {
    kind: 'parseError',
    receivedAt,
    errorKind: 'TruncatedRequiredField',
    reason: `${what} too short: ${frame.length} bytes (expected at least ${required})`,
    byteLength: frame.length,
    raw: frame
  };
}
