import { DecodedReport, DeviceSessionState, SensorSighting } from '../types/protocol';

type WithHex<T> = Omit<T, 'raw'> & { rawData: string; dataLength: number };

const withHex = <T extends { raw: Buffer }>(report: T): WithHex<T> => {
  const { raw, ...rest } = report;
  return { ...rest, rawData: raw.toString('hex'), dataLength: raw.length };
};

const serializeSensor = ({ rawPayload, ...sensor }: SensorSighting) => ({
  ...sensor,
  rawPayload: rawPayload ? rawPayload.toString('hex') : null
});

/** JSON shape for the query surface: buffers become lower-case hex. */
export function serializeReport(report: DecodedReport) {
  switch (report.kind) {
    case 'beaconScan':
      return { ...withHex(report), sensors: report.sensors.map(serializeSensor) };
    case 'status':
      return withHex(report);
    case 'parseError':
      return withHex(report);
    case 'unknownHeader':
      return withHex(report);
  }
}

export function serializeSession(state: DeviceSessionState) {
  const { lastSeenByMac, ...rest } = state;
  const lastSeen: Record<string, string> = {};
  for (const [mac, seenAt] of lastSeenByMac) {
    lastSeen[mac] = seenAt.toISOString();
  }
  return { ...rest, lastSeenByMac: lastSeen };
}
