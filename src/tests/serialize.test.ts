import { strict as assert } from 'assert';
import { describe, it } from 'node:test';
import { serializeReport, serializeSession } from '../api/serialize';
import { createSessionState } from '../session/sessionTracker';
import { FrameDispatcher } from '../tcp/dispatcher';
import { beaconFrame, PAYLOAD_FLAGS_ONLY, TARGET_MAC } from './frames';

const dispatcher = new FrameDispatcher();
const t0 = new Date('2024-01-15T13:45:30.000Z');

describe('serializeReport', () => {
  it('renders raw bytes as hex', () => {
    const json = serializeReport(dispatcher.dispatch(Buffer.from([0x7E, 0x01]), t0));
    assert.equal(json.rawData, '7e01');
    assert.equal(json.dataLength, 2);
    assert.equal('raw' in json, false);
  });

  it('renders sensor payloads as hex', () => {
    const json = serializeReport(dispatcher.dispatch(
      beaconFrame({ sensors: [{ payload: PAYLOAD_FLAGS_ONLY, mac: TARGET_MAC, rssi: 0xC4 }] }),
      t0
    ));
    assert.equal(json.kind, 'beaconScan');
    if (json.kind !== 'beaconScan') return;
    assert.equal(json.sensors[0].rawPayload, '020106');
    assert.equal(json.dataLength, 46);
  });
});

describe('serializeSession', () => {
  it('turns the last-seen map into ISO timestamps', () => {
    const state = createSessionState();
    state.lastSeenByMac.set('AC:23:3F:11:22:33', t0);
    assert.deepEqual(serializeSession(state), {
      currentIgnitionStatus: 'OFF',
      previousIgnitionStatus: null,
      currentLatitude: null,
      currentLongitude: null,
      currentInputVoltageMv: null,
      lastSeenByMac: { 'AC:23:3F:11:22:33': '2024-01-15T13:45:30.000Z' }
    });
  });
});
