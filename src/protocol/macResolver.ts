import { MacOrientation } from '../types/protocol';
import { formatMac } from './codec';

export const DEFAULT_TARGET_PREFIXES = ['AC233F', 'C30000'];

export interface ResolvedMac {
  address: string;       // AA:BB:CC:DD:EE:FF
  key: string;           // AABBCCDDEEFF
  orientation: MacOrientation;
  isTarget: boolean;
}

/**
 * Vendor address prefixes that identify tracker tags. Prefixes are hex digit
 * strings and may be an odd number of digits long ("C3000").
 */
export class TargetPrefixSet {
  readonly prefixes: readonly string[];

  constructor(prefixes: Iterable<string> = DEFAULT_TARGET_PREFIXES) {
    const normalized = new Set<string>();
    for (const entry of prefixes) {
      const prefix = entry.replace(/[:\-\s]/g, '').toUpperCase();
      if (!prefix) continue;
      if (!/^[0-9A-F]{1,12}$/.test(prefix)) {
        throw new Error(`Invalid target MAC prefix: "${entry}"`);
      }
      normalized.add(prefix);
    }
    this.prefixes = Array.from(normalized);
  }

  static fromList(list: string): TargetPrefixSet {
    return new TargetPrefixSet(list.split(','));
  }

  matches(hex: string): boolean {
    const upper = hex.toUpperCase();
    return this.prefixes.some((prefix) => upper.startsWith(prefix));
  }
}

/**
 * Tags are reported in either byte order depending on firmware. Try the wire
 * order first, then the reversed order, and keep the first that carries a
 * target prefix. Addresses matching neither stay in wire order.
 */
export function resolveMac(bytes: Buffer, targets: TargetPrefixSet): ResolvedMac {
  const bigEndian = bytes.toString('hex').toUpperCase();
  if (targets.matches(bigEndian)) {
    return { address: formatMac(bigEndian), key: bigEndian, orientation: 'big', isTarget: true };
  }

  const littleEndian = Buffer.from(bytes).reverse().toString('hex').toUpperCase();
  if (targets.matches(littleEndian)) {
    return { address: formatMac(littleEndian), key: littleEndian, orientation: 'little', isTarget: true };
  }

  return { address: formatMac(bigEndian), key: bigEndian, orientation: 'big', isTarget: false };
}
