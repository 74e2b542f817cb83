import { strict as assert } from 'assert';
import { describe, it } from 'node:test';
import { StatusParser } from '../tcp/statusParser';
import { StatusReport } from '../types/protocol';
import { statusFrame } from './frames';

const AT = '2024-01-15T13:45:30.000Z';

const parseStatus = (frame: Buffer): StatusReport => {
  const report = StatusParser.parse(frame, AT);
  assert.equal(report.kind, 'status');
  if (report.kind !== 'status') throw new Error('expected a status report');
  return report;
};

describe('StatusParser', () => {
  it('decodes every field of a complete 58-byte frame', () => {
    const frame = statusFrame();
    assert.equal(frame.length, 58);

    const report = parseStatus(frame);
    assert.equal(report.receivedAt, AT);
    assert.equal(report.header, 0x81);
    assert.equal(report.headerLabel, '0x81 (No ACK required)');
    assert.equal(report.packetLength, 58);
    assert.equal(report.deviceId, 1990000910);
    assert.equal(report.reportMap, 0x007FFF);
    assert.equal(report.model, 42);
    assert.equal(report.softwareVersion, '1.2.0345');
    assert.equal(report.messageType, 'Real Time');
    assert.equal(report.gpsTimestamp, '20240115 13:45:30');
    assert.deepEqual(report.gps, {
      latitude: 19.432608,
      longitude: -99.133209,
      speedKmh: 60.25,
      courseDeg: 180.5,
      satellites: 9,
      fixStatus: 'Fixed',
      fixStatusCode: 1
    });
    assert.deepEqual(report.cellular, { cellId: '0001E240', mcc: 334, mnc: 20, lac: '1A2B', rxLevel: 31 });
    assert.deepEqual(report.status, {
      inputState: 1,
      outputState: 0,
      ignition: 'ON',
      deviceMode: 'Driving',
      deviceModeCode: 1,
      reportTypeId: 2,
      messageNumber: 258,
      inputVoltageMv: null
    });
    assert.equal(report.assignMap, 1);
    assert.equal(report.rawTrailingDataLength, 0);
    assert.equal(report.raw, frame);
  });

  it('degrades a 16-byte frame to defaults instead of failing', () => {
    const report = parseStatus(statusFrame().subarray(0, 16));
    assert.equal(report.deviceId, 1990000910);
    assert.equal(report.messageType, 'Real Time');
    assert.equal(report.gpsTimestamp, null);
    assert.deepEqual(report.gps, {
      latitude: 0,
      longitude: 0,
      speedKmh: 0,
      courseDeg: 0,
      satellites: 0,
      fixStatus: 'Not Fixed',
      fixStatusCode: 0
    });
    assert.equal(report.cellular.cellId, '00000000');
    assert.equal(report.cellular.lac, '0000');
    assert.equal(report.status.ignition, null);
    assert.equal(report.status.deviceMode, '0');
    assert.equal(report.rawTrailingDataLength, 0);
  });

  it('keeps fields that fit in a partially truncated frame', () => {
    const report = parseStatus(statusFrame().subarray(0, 41));
    assert.equal(report.gpsTimestamp, '20240115 13:45:30');
    assert.equal(report.gps.latitude, 19.432608);
    assert.equal(report.gps.longitude, -99.133209);
    assert.equal(report.gps.speedKmh, 0);
    assert.equal(report.status.ignition, null);
  });

  it('rejects frames missing the required leading fields', () => {
    const frame = statusFrame().subarray(0, 15);
    const report = StatusParser.parse(frame, AT);
    assert.equal(report.kind, 'parseError');
    if (report.kind !== 'parseError') return;
    assert.equal(report.errorKind, 'TruncatedRequiredField');
    assert.equal(report.reason, 'STT message too short: 15 bytes (expected at least 16)');
    assert.equal(report.byteLength, 15);
    assert.equal(report.raw, frame);
  });

  it('derives ignition from input bit 0', () => {
    assert.equal(parseStatus(statusFrame({ inputState: 0x02 })).status.ignition, 'OFF');
    assert.equal(parseStatus(statusFrame({ inputState: 0x03 })).status.ignition, 'ON');
  });

  it('maps fix status and device mode codes, passing unknown codes through', () => {
    const frame = Buffer.from(statusFrame());
    frame[46] = 3;
    frame[49] = 5;
    let report = parseStatus(frame);
    assert.equal(report.gps.fixStatus, 'DR Activated');
    assert.equal(report.status.deviceMode, 'Deactivate Zone');

    frame[46] = 7;
    frame[49] = 9;
    report = parseStatus(frame);
    assert.equal(report.gps.fixStatus, '7');
    assert.equal(report.status.deviceMode, '9');
  });

  it('accepts input voltage only between 10 V and 20 V', () => {
    const plausible = parseStatus(statusFrame({ voltageMv: 12600 }));
    assert.equal(plausible.status.inputVoltageMv, 12600);
    assert.equal(plausible.rawTrailingDataLength, 2);

    assert.equal(parseStatus(statusFrame({ voltageMv: 20000 })).status.inputVoltageMv, 20000);
    assert.equal(parseStatus(statusFrame({ voltageMv: 9999 })).status.inputVoltageMv, null);
    assert.equal(parseStatus(statusFrame({ voltageMv: 25000 })).status.inputVoltageMv, null);
  });
});
