import { CanIdCodec } from "./canId.js";

/** Request PGN (0xEA00): asks another node to transmit a PGN */
export const REQUEST_PGN = 0xea00;

export const DEFAULT_REQUEST_PRIORITY = 6;

export interface RequestFrame {
  canId: number;
  /** Requested PGN, little-endian */
  data: Uint8Array;
}

export interface RequestOptions {
  priority?: number;
}

export class RequestBuilder {
  /**
   * Builds a single Request PGN frame. Response handling is up to the caller.
   *
   * @example
   * // Ask ECU 0x00 for engine hours (PGN 65253) from tool address 0xFE
   * RequestBuilder.buildRequestPgn(0xfe, 0x00, 65253);
   * // { canId: 0x18ea00fe, data: [0xe5, 0xfe, 0x00] }
   */
  static buildRequestPgn(
    requesterSa: number,
    targetDa: number,
    pgn: number,
    options: RequestOptions = {}
  ): RequestFrame {
    const { priority = DEFAULT_REQUEST_PRIORITY } = options;

    const canId = CanIdCodec.buildForPgn({
      priority,
      pgn: REQUEST_PGN,
      sourceAddress: requesterSa,
      destinationAddress: targetDa,
    });

    const data = new Uint8Array([
      pgn & 0xff,
      (pgn >>> 8) & 0xff,
      (pgn >>> 16) & 0xff,
    ]);

    return { canId, data };
  }
}
