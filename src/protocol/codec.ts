// Field primitives shared by the status and BLE scan decoders. All multi-byte
// integers on the wire are big-endian.

const toHex = (bytes: Buffer): string => bytes.toString('hex').toUpperCase();

const isValidBcd = (bytes: Buffer): boolean => {
  for (const byte of bytes) {
    if (((byte >> 4) & 0x0F) > 9 || (byte & 0x0F) > 9) return false;
  }
  return true;
};

const bcdByte = (byte: number): number => ((byte >> 4) & 0x0F) * 10 + (byte & 0x0F);

/**
 * Two decimal digits per byte. Some firmware builds put raw hex in fields
 * documented as BCD, so a nibble above 9 switches the whole field to a
 * hexadecimal reading (0x1A2B -> 6699).
 */
export const decodeBCD = (bytes: Buffer): number => {
  if (bytes.length === 0) return 0;
  if (!isValidBcd(bytes)) {
    return parseInt(toHex(bytes), 16);
  }

  let result = 0;
  for (const byte of bytes) {
    result = result * 100 + bcdByte(byte);
  }
  return result;
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * YY MM DD -> "YYYYMMDD". Each byte is read as high*10 + low whatever its
 * nibbles, so one odd byte cannot disturb its neighbours. Only a field of the
 * wrong length falls back to the hex digits.
 */
export const decodeDate = (bytes: Buffer): string => {
  if (bytes.length === 3) {
    return `${2000 + bcdByte(bytes[0])}${pad2(bcdByte(bytes[1]))}${pad2(bcdByte(bytes[2]))}`;
  }

  const hex = toHex(bytes);
  const year = 2000 + (hex.length >= 2 ? parseInt(hex.slice(0, 2), 16) : 0);
  return `${year}${hex.slice(2, 4) || '00'}${hex.slice(4, 6) || '00'}`;
};

/** HH MM SS -> "HH:MM:SS", same per-byte decoding and fallback as the date. */
export const decodeTime = (bytes: Buffer): string => {
  if (bytes.length === 3) {
    return Array.from(bytes, (byte) => pad2(bcdByte(byte))).join(':');
  }

  const hex = toHex(bytes);
  return [hex.slice(0, 2), hex.slice(2, 4), hex.slice(4, 6)].map((part) => part || '00').join(':');
};

/** Signed 32-bit micro-degrees -> decimal degrees. */
export const decodeCoordinate = (bytes: Buffer): number => {
  return bytes.readInt32BE(0) / 1_000_000;
};

/** Unsigned 16-bit hundredths, used for speed (km/h) and course (degrees). */
export const decodeHundredths = (bytes: Buffer): number => {
  return bytes.readUInt16BE(0) / 100;
};

/**
 * Software version is three raw bytes rendered as hex digits and split as
 * "d.d.dddd" (0x12 0x03 0x45 -> "1.2.0345").
 */
export const decodeSoftwareVersion = (bytes: Buffer): string => {
  const hex = toHex(bytes).padEnd(6, '0');
  return `${hex[0]}.${hex[1]}.${hex.slice(2)}`;
};

export const formatMac = (hex: string): string => {
  return (hex.toUpperCase().match(/.{1,2}/g) || []).join(':');
};

export const hexByte = (value: number): string => {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
};
