/**
 * Payload bytes as handed over by a CAN transport or trace parser
 */
export type Payload = Uint8Array | readonly number[];

export const MAX_FIELD_BITS = 64;

export class BitExtractor {
  /**
   * Number of payload bytes a field touches, counted from `startByte`.
   */
  static byteSpan(startBit: number, lengthBits: number): number {
    return Math.ceil((startBit + lengthBits) / 8);
  }

  /**
   * Reads an unsigned field of `lengthBits` bits starting at absolute bit
   * `startByte * 8 + startBit`. Bytes are little-endian: byte 0 holds the
   * least significant bits, and a field may span byte boundaries.
   *
   * Returns null when the payload is too short for the field or the
   * geometry is invalid (length outside 1-64, start bit outside 0-7).
   *
   * @example
   * // Engine speed: 16 bits at byte 3
   * BitExtractor.extractBits([0, 0, 0, 0x20, 0x4e, 0, 0, 0], 3, 0, 16); // 20000n
   */
  static extractBits(
    data: Payload,
    startByte: number,
    startBit: number,
    lengthBits: number
  ): bigint | null {
    if (
      !Number.isInteger(lengthBits) ||
      lengthBits < 1 ||
      lengthBits > MAX_FIELD_BITS
    ) {
      return null;
    }
    if (!Number.isInteger(startByte) || startByte < 0) return null;
    if (!Number.isInteger(startBit) || startBit < 0 || startBit > 7) {
      return null;
    }

    const span = this.byteSpan(startBit, lengthBits);
    if (data.length < startByte + span) return null;

    let acc = 0n;
    for (let i = 0; i < span; i++) {
      acc |= BigInt(data[startByte + i] & 0xff) << BigInt(i * 8);
    }

    const mask = (1n << BigInt(lengthBits)) - 1n;
    return (acc >> BigInt(startBit)) & mask;
  }

  /** All-ones pattern of the given width, e.g. 0xFFn for 8 bits */
  static allOnes(lengthBits: number): bigint {
    return (1n << BigInt(lengthBits)) - 1n;
  }
}
