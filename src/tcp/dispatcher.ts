import { hexByte } from '../protocol/codec';
import { TargetPrefixSet } from '../protocol/macResolver';
import { DecodedReport, FrameHeader, ParseError, UnknownHeader } from '../types/protocol';
import { BeaconScanParser } from './beaconScanParser';
import { StatusParser } from './statusParser';

export class FrameDispatcher {
  constructor(private readonly targets: TargetPrefixSet = new TargetPrefixSet()) {}

  /** Every frame produces a report variant; nothing here throws. */
  dispatch(frame: Buffer, receivedAt: Date = new Date()): DecodedReport {
    const at = receivedAt.toISOString();

    if (frame.length === 0) {
      return FrameDispatcher.parseError(frame, at, 'EmptyFrame', 'empty message');
    }

    const header = frame[0];
    try {
      switch (header) {
        case FrameHeader.STATUS:
          return StatusParser.parse(frame, at);
        case FrameHeader.STATUS_VARIANT: {
          const report = StatusParser.parse(frame, at);
          if (report.kind === 'status') return report;
          return FrameDispatcher.unknownHeader(frame, at, header, 'STT Variant', report.reason);
        }
        case FrameHeader.BLE_SCAN:
        case FrameHeader.BLE_SCAN_ACK:
          return BeaconScanParser.parse(frame, at, this.targets);
        default:
          return FrameDispatcher.unknownHeader(frame, at, header, null, `Unknown Header: ${hexByte(header)}`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return FrameDispatcher.parseError(frame, at, 'DecodeFailure', `Decode failure at header ${hexByte(header)}: ${reason}`);
    }
  }

  private static parseError(frame: Buffer, receivedAt: string, errorKind: ParseError['errorKind'], reason: string): ParseError {
    return { kind: 'parseError', receivedAt, errorKind, reason, byteLength: frame.length, raw: frame };
  }

  private static unknownHeader(
    frame: Buffer,
    receivedAt: string,
    headerByte: number,
    label: string | null,
    reason: string
  ): UnknownHeader {
    return { kind: 'unknownHeader', receivedAt, headerByte, label, reason, raw: frame };
  }
}
