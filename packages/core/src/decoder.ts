import { BitExtractor, type Payload } from "./bits.js";
import { DEFAULT_DATABASE } from "./builtin.js";
import { CanIdCodec } from "./canId.js";
import type { SpnDatabase, SpnDefinition } from "./database.js";

/**
 * One SPN decoded to engineering units
 */
export interface DecodedSpn {
  spn: number;
  name: string;
  value: number;
  unit: string;
  pgn: number;
  /** Raw field value before scale and offset */
  raw: bigint;
}

/**
 * Outcome of reading one SPN, keeping the reason a value is missing.
 *
 * `decodeSpn` and `decodeFrame` collapse both failure states into "no
 * value"; use `inspect` when a short frame must be told apart from a sender
 * reporting "not available".
 */
export type SpnReading =
  | { status: "ok"; raw: bigint; value: number }
  | { status: "not-available"; raw: bigint }
  | { status: "short-payload" };

export class SpnDecoder {
  static inspect(data: Payload, def: SpnDefinition): SpnReading {
    const raw = BitExtractor.extractBits(
      data,
      def.startByte,
      def.startBit,
      def.lengthBits
    );
    if (raw === null) return { status: "short-payload" };
    if (raw === def.notAvailableRaw) return { status: "not-available", raw };

    return { status: "ok", raw, value: Number(raw) * def.scale + def.offset };
  }

  /**
   * Decodes one SPN to engineering units.
   *
   * @returns null if the payload is too short or the sender marked the
   *   value as not available
   *
   * @example
   * // Coolant temperature, raw 130 -> 130 * 1 - 40 = 90 C
   * SpnDecoder.decodeSpn([130, 0, 0, 0, 0, 0, 0, 0], spn110); // 90
   */
  static decodeSpn(data: Payload, def: SpnDefinition): number | null {
    const reading = this.inspect(data, def);
    return reading.status === "ok" ? reading.value : null;
  }

  static decodeSpnFull(data: Payload, def: SpnDefinition): DecodedSpn | null {
    const reading = this.inspect(data, def);
    if (reading.status !== "ok") return null;

    return {
      spn: def.spn,
      name: def.name,
      value: reading.value,
      unit: def.unit,
      pgn: def.pgn,
      raw: reading.raw,
    };
  }

  /** Looks the SPN up by number first; unknown SPNs yield null */
  static decodeSpnByNumber(
    spn: number,
    data: Payload,
    database: SpnDatabase = DEFAULT_DATABASE
  ): number | null {
    const def = database.getSpnDef(spn);
    return def ? this.decodeSpn(data, def) : null;
  }

  /**
   * Decodes every known SPN of the frame's PGN.
   *
   * SPNs without a value are left out. An unknown PGN gives an empty array.
   * Results follow the database's registration order for the PGN.
   */
  static decodeFrame(
    canId: number,
    data: Payload,
    database: SpnDatabase = DEFAULT_DATABASE
  ): DecodedSpn[] {
    const pgn = CanIdCodec.extractPgn(canId);
    const results: DecodedSpn[] = [];

    for (const def of database.getSpnsForPgn(pgn)) {
      const decoded = this.decodeSpnFull(data, def);
      if (decoded) results.push(decoded);
    }

    return results;
  }
}
