// Frame builders shared by the decoder and session tests.

export const DEVICE_ID_BCD = [0x19, 0x90, 0x00, 0x09, 0x10];   // 1990000910
const REPORT_MAP = [0x00, 0x7F, 0xFF];
const MODEL = 0x2A;
const SW_VERSION = [0x12, 0x03, 0x45];                          // "1.2.0345"

const int32 = (value: number): number[] => {
  const bytes = Buffer.alloc(4);
  bytes.writeInt32BE(value, 0);
  return Array.from(bytes);
};

const uint16 = (value: number): number[] => [(value >> 8) & 0xFF, value & 0xFF];

export interface StatusFrameOptions {
  header?: number;
  inputState?: number;
  latitude?: number;     // micro-degrees
  longitude?: number;    // micro-degrees
  voltageMv?: number;    // appended after the fixed block
}

/** A complete 58-byte STT frame (60 with a voltage field). */
export function statusFrame(options: StatusFrameOptions = {}): Buffer {
  const bytes = [
    options.header ?? 0x81,
    ...uint16(options.voltageMv === undefined ? 58 : 60),
    ...DEVICE_ID_BCD,
    ...REPORT_MAP,
    MODEL,
    ...SW_VERSION,
    0x01,                               // real time
    0x24, 0x01, 0x15,                   // 2024-01-15
    0x13, 0x45, 0x30,                   // 13:45:30
    0x00, 0x01, 0xE2, 0x40,             // cell id
    0x03, 0x34,                         // mcc 334
    0x00, 0x20,                         // mnc 20
    0x1A, 0x2B,                         // lac
    0x1F,                               // rx level 31
    ...int32(options.latitude ?? 19432608),
    ...int32(options.longitude ?? -99133209),
    ...uint16(6025),                    // 60.25 km/h
    ...uint16(18050),                   // 180.50 deg
    0x09,                               // satellites
    0x01,                               // fixed
    options.inputState ?? 0x01,
    0x00,                               // outputs
    0x01,                               // driving
    0x02,                               // report type
    ...uint16(258),                     // message number
    0x00,                               // reserved
    0x00, 0x00, 0x00, 0x01              // assign map
  ];
  if (options.voltageMv !== undefined) {
    bytes.push(...uint16(options.voltageMv));
  }
  return Buffer.from(bytes);
}

export interface SensorEntry {
  payload: number[];
  mac: number[];
  rssi: number;          // raw byte
}

export interface BeaconFrameOptions {
  header?: number;
  sensorCount?: number;
  sensors?: SensorEntry[];
  trailing?: number[];
  withLocation?: boolean;
}

/** BLE scan frame: 34-byte metadata block, structured entries, then `trailing`. */
export function beaconFrame(options: BeaconFrameOptions = {}): Buffer {
  const sensors = options.sensors ?? [];
  const bytes = [
    options.header ?? 0xAA,
    0x00, 0x00,                         // packet length, not validated
    ...DEVICE_ID_BCD,
    ...REPORT_MAP,
    MODEL,
    ...SW_VERSION,
    0x01,                               // scan performed
    0x02,                               // total reports
    0x01,                               // current report
    ...uint16(options.sensorCount ?? sensors.length)
  ];
  if (options.withLocation ?? true) {
    bytes.push(
      0x24, 0x01, 0x15,
      0x13, 0x45, 0x30,
      ...int32(40712776),
      ...int32(-74005974)
    );
  }
  for (const sensor of sensors) {
    bytes.push(...uint16(sensor.payload.length), ...sensor.payload, ...sensor.mac, sensor.rssi);
  }
  bytes.push(...(options.trailing ?? []));
  return Buffer.from(bytes);
}

export const TARGET_MAC = [0xAC, 0x23, 0x3F, 0x11, 0x22, 0x33];
export const OTHER_MAC = [0x01, 0x02, 0x03, 0x04, 0x05, 0x06];

// Flags AD structure, then Battery Service data reporting 85 %.
export const PAYLOAD_WITH_BATTERY = [0x02, 0x01, 0x06, 0x04, 0x16, 0x0F, 0x18, 0x55];
export const PAYLOAD_FLAGS_ONLY = [0x02, 0x01, 0x06];
