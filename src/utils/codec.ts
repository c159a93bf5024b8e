// Byte order helpers for colorimeter frames (all multi-byte fields are little-endian)

export const les16 = {
  read: (buf: Buffer, off: number) => buf.readInt16LE(off),
  write: (buf: Buffer, off: number, v: number) => buf.writeInt16LE(clampInt16(v), off)
};

export function clampInt16(v: number): number {
  return Math.max(-0x8000, Math.min(0x7fff, Math.trunc(v)));
}

export function fromHex(str: string): Buffer {
  const clean = str.replace(/[\s:]/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: ${str}`);
  }
  return Buffer.from(clean, 'hex');
}

export function hex(buf: Buffer): string {
  return [...buf].map(b => b.toString(16).padStart(2, '0')).join(' ');
}
