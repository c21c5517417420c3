import { PublicKey } from "@solana/web3.js";

// ============================================================================
// LITTLE-ENDIAN ENCODING HELPERS
// ============================================================================

/**
 * Convert a bigint to a little-endian Uint8Array (u64)
 */
export function u64ToBytes(value: bigint): Uint8Array {
  const buffer = new ArrayBuffer(8);
  const view = new DataView(buffer);
  view.setBigUint64(0, value, true); // little-endian
  return new Uint8Array(buffer);
}

/**
 * Convert a number to a little-endian Uint8Array (u32)
 */
export function u32ToBytes(value: number): Uint8Array {
  const buffer = new ArrayBuffer(4);
  const view = new DataView(buffer);
  view.setUint32(0, value, true);
  return new Uint8Array(buffer);
}

/**
 * Length-prefixed (u32) UTF-8 string, as written by borsh
 */
export function stringToBytes(value: string): Uint8Array {
  const encoded = Buffer.from(value, "utf8");
  return Buffer.concat([u32ToBytes(encoded.length), encoded]);
}

// ============================================================================
// READER
// ============================================================================

/**
 * Sequential reader over a byte buffer. Reads past the end throw a RangeError.
 */
export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  u8(): number {
    this.require(1);
    return this.view.getUint8(this.offset++);
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  u64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  i64(): bigint {
    this.require(8);
    const value = this.view.getBigInt64(this.offset, true);
    this.offset += 8;
    return value;
  }

  f64(): number {
    this.require(8);
    const value = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return value;
  }

  pubkey(): PublicKey {
    this.require(32);
    const key = new PublicKey(this.bytes.subarray(this.offset, this.offset + 32));
    this.offset += 32;
    return key;
  }

  skip(length: number): this {
    this.require(length);
    this.offset += length;
    return this;
  }

  string(): string {
    const length = this.u32();
    this.require(length);
    const value = Buffer.from(this.bytes.subarray(this.offset, this.offset + length)).toString("utf8");
    this.offset += length;
    return value;
  }

  private require(length: number): void {
    if (this.offset + length > this.bytes.length) {
      throw new RangeError(`read of ${length} bytes at offset ${this.offset} overruns ${this.bytes.length}`);
    }
  }
}

/**
 * Writes into a fixed-size buffer at increasing offsets.
 */
export class ByteWriter {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  u8(value: number): this {
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
    return this;
  }

  u32(value: number): this {
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
    return this;
  }

  u64(value: bigint): this {
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
    return this;
  }

  i64(value: bigint): this {
    this.buffer.writeBigInt64LE(value, this.offset);
    this.offset += 8;
    return this;
  }

  f64(value: number): this {
    this.buffer.writeDoubleLE(value, this.offset);
    this.offset += 8;
    return this;
  }

  pubkey(value: PublicKey): this {
    this.buffer.set(value.toBytes(), this.offset);
    this.offset += 32;
    return this;
  }

  /** Leave `length` bytes as they are */
  skip(length: number): this {
    this.offset += length;
    return this;
  }
}
