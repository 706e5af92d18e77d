/**
 * J1939 29-bit extended CAN identifier layout:
 *
 * ```text
 * | Priority | R | DP | PF | PS/DA | SA |
 * |   3 bit  |1b | 1b | 8b |  8b   | 8b |
 * ```
 */
export const J1939_ADDRESS = {
  GLOBAL: 0xff, // Broadcast destination
  NULL: 0xfe, // Node without a claimed address
} as const;

/** PDU format values at or above this are PDU2 (broadcast) */
export const PDU2_THRESHOLD = 240;

export const MAX_CAN_ID = 0x1fffffff;

export type PduType = "PDU1" | "PDU2";

/**
 * Decoded view of a 29-bit CAN identifier
 */
export interface CanIdentifier {
  /** Message priority (0-7, lower is higher priority) */
  priority: number;
  /** Reserved bit (bit 25), carried through but not interpreted */
  reserved: number;
  /** Data page bit (bit 24) */
  dataPage: number;
  /** PDU format (bits 16-23) */
  pduFormat: number;
  /** PDU specific (bits 8-15): destination under PDU1, PGN low byte under PDU2 */
  pduSpecific: number;
  /** Source address of the transmitting ECU */
  sourceAddress: number;
  /** Parameter Group Number derived from DP, PF and (PDU2 only) PS */
  pgn: number;
  pduType: PduType;
  /** PS under PDU1, the global address under PDU2 */
  destinationAddress: number;
}

/**
 * Raw identifier fields. Values wider than their field are masked.
 */
export interface CanIdFields {
  priority: number;
  reserved?: number;
  dataPage: number;
  pduFormat: number;
  pduSpecific: number;
  sourceAddress: number;
}

export interface PgnAddressing {
  priority: number;
  pgn: number;
  sourceAddress: number;
  /** Only used by PDU1 PGNs; defaults to the global address */
  destinationAddress?: number;
}

export class CanIdCodec {
  private static pgnOf(dp: number, pf: number, ps: number): number {
    return pf >= PDU2_THRESHOLD
      ? (dp << 16) | (pf << 8) | ps
      : (dp << 16) | (pf << 8);
  }

  /**
   * Splits a CAN identifier into its J1939 fields.
   * Never fails; the top 3 bits of a 32-bit value are discarded.
   *
   * @example
   * CanIdCodec.parse(0x0cf00400).pgn; // 61444 (EEC1)
   */
  static parse(canId: number): CanIdentifier {
    const sourceAddress = canId & 0xff;
    const pduSpecific = (canId >>> 8) & 0xff;
    const pduFormat = (canId >>> 16) & 0xff;
    const dataPage = (canId >>> 24) & 0x01;
    const reserved = (canId >>> 25) & 0x01;
    const priority = (canId >>> 26) & 0x07;

    const pduType: PduType = pduFormat >= PDU2_THRESHOLD ? "PDU2" : "PDU1";

    return {
      priority,
      reserved,
      dataPage,
      pduFormat,
      pduSpecific,
      sourceAddress,
      pgn: this.pgnOf(dataPage, pduFormat, pduSpecific),
      pduType,
      destinationAddress:
        pduType === "PDU1" ? pduSpecific : J1939_ADDRESS.GLOBAL,
    };
  }

  /**
   * Packs fields into a 29-bit identifier.
   *
   * Out-of-range values are silently truncated to their field width, so
   * callers taking user input should range-check first.
   */
  static build(fields: CanIdFields): number {
    const {
      priority,
      reserved = 0,
      dataPage,
      pduFormat,
      pduSpecific,
      sourceAddress,
    } = fields;
    return (
      (((priority & 0x07) << 26) |
        ((reserved & 0x01) << 25) |
        ((dataPage & 0x01) << 24) |
        ((pduFormat & 0xff) << 16) |
        ((pduSpecific & 0xff) << 8) |
        (sourceAddress & 0xff)) >>>
      0
    );
  }

  /**
   * Builds an identifier for a PGN. PDU2 PGNs supply PS themselves; PDU1
   * PGNs take the destination address instead.
   */
  static buildForPgn(addressing: PgnAddressing): number {
    const { priority, pgn, sourceAddress } = addressing;
    const pduFormat = (pgn >>> 8) & 0xff;
    const pduSpecific =
      pduFormat >= PDU2_THRESHOLD
        ? pgn & 0xff
        : addressing.destinationAddress ?? J1939_ADDRESS.GLOBAL;

    return this.build({
      priority,
      dataPage: (pgn >>> 16) & 0x01,
      pduFormat,
      pduSpecific,
      sourceAddress,
    });
  }

  /** PGN only, without building the full record */
  static extractPgn(canId: number): number {
    return this.pgnOf(
      (canId >>> 24) & 0x01,
      (canId >>> 16) & 0xff,
      (canId >>> 8) & 0xff
    );
  }

  static extractSourceAddress(canId: number): number {
    return canId & 0xff;
  }

  static isValidId(canId: number): boolean {
    return Number.isInteger(canId) && canId >= 0 && canId <= MAX_CAN_ID;
  }

  static isBroadcastPgn(pgn: number): boolean {
    return ((pgn >>> 8) & 0xff) >= PDU2_THRESHOLD;
  }
}
