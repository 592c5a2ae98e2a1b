import os from 'os';

// Byte order helpers for ID100 wire records.
// The ID100 is big-endian: every 16-bit word on the wire has its high byte first.

/** Byte order of the host, resolved once at load time */
export const HOST_ENDIANNESS: 'BE' | 'LE' = os.endianness();
const HOST_IS_BIG_ENDIAN = HOST_ENDIANNESS === 'BE';

/**
 * Swap the two bytes of a 16-bit value. Applying it twice yields the original value.
 */
export function swap16(value: number): number {
  const word = value & 0xffff;
  return ((word & 0xff) << 8) | (word >>> 8);
}

/**
 * Convert a host-order word to wire order (no-op on big-endian hosts)
 */
export function toWireOrder16(value: number): number {
  return HOST_IS_BIG_ENDIAN ? value & 0xffff : swap16(value);
}

/**
 * Convert a wire-order word back to host order. The conversion is symmetric,
 * so this is the same transform as toWireOrder16.
 */
export function fromWireOrder16(value: number): number {
  return toWireOrder16(value);
}

function assertWord(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`Value ${value} does not fit in 16 bits`);
  }
}

/**
 * 16-bit fields declared as wire-order sensitive. Values are normalized to wire
 * order and then stored in host order, which lands the bytes big-endian.
 */
export const word = {
  read: (buf: Buffer, off: number): number => {
    const raw = HOST_IS_BIG_ENDIAN ? buf.readUInt16BE(off) : buf.readUInt16LE(off);
    return fromWireOrder16(raw);
  },
  write: (buf: Buffer, off: number, v: number): void => {
    assertWord(v);
    const wire = toWireOrder16(v);
    if (HOST_IS_BIG_ENDIAN) buf.writeUInt16BE(wire, off);
    else buf.writeUInt16LE(wire, off);
  }
};

// IEEE-754 single precision, high byte first
export const f32 = {
  read: (buf: Buffer, off: number) => buf.readFloatBE(off),
  write: (buf: Buffer, off: number, v: number) => buf.writeFloatBE(v, off)
};

export function hex(buf: Buffer): string {
  return [...buf].map(b => b.toString(16).padStart(2, '0')).join(' ');
}

/**
 * Parse a hex string such as "00ff10" or "00 ff 10" into bytes
 */
export function parseHex(text: string): Buffer {
  const clean = text.replace(/[\s:]/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new RangeError(`Invalid hex string: ${text}`);
  }
  return Buffer.from(clean, 'hex');
}

/**
 * Render a command tag for messages: the ASCII character when printable, hex otherwise
 */
export function tagToString(tag: number): string {
  if (tag >= 0x20 && tag <= 0x7e) return String.fromCharCode(tag);
  return `0x${tag.toString(16).padStart(2, '0')}`;
}
