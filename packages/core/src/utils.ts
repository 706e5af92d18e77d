import { MAX_CAN_ID } from "./canId.js";
import { J1939Error } from "./errors.js";

export class Utils {
  /**
   * Parses a payload written as hex: "00 00 20 4E", "0000204E" or
   * "00,00,20,4E" all give the same 4 bytes.
   */
  static parseHexBytes(input: string, maxLength = 8): Uint8Array {
    const trimmed = input.trim();
    if (trimmed === "") return new Uint8Array(0);

    let tokens: string[];
    if (/[\s,:]/.test(trimmed)) {
      tokens = trimmed.split(/[\s,:]+/).filter((t) => t.length > 0);
    } else {
      const digits = trimmed.replace(/^(0x|0X)/, "");
      if (digits.length % 2 !== 0) {
        throw new J1939Error(
          `Payload '${input}' has an odd number of hex digits`,
          "INVALID_HEX",
          { input }
        );
      }
      tokens = digits.match(/.{2}/g) ?? [];
    }

    const bytes = tokens.map((token) => {
      const clean = token.replace(/^(0x|0X)/, "");
      if (!/^[0-9A-Fa-f]{1,2}$/.test(clean)) {
        throw new J1939Error(
          `Invalid payload byte '${token}' in '${input}'`,
          "INVALID_HEX",
          { input }
        );
      }
      return parseInt(clean, 16);
    });

    if (bytes.length > maxLength) {
      throw new J1939Error(
        `Payload too long: expected at most ${maxLength} bytes, got ${bytes.length}`,
        "OUT_OF_RANGE",
        { length: bytes.length, maxLength }
      );
    }

    return new Uint8Array(bytes);
  }

  /**
   * Parses a 29-bit identifier given in hex, with or without 0x prefix.
   */
  static parseCanId(input: string): number {
    const clean = input.trim().replace(/^(0x|0X)/, "");
    if (!/^[0-9A-Fa-f]{1,8}$/.test(clean)) {
      throw new J1939Error(
        `Invalid CAN ID '${input}': must be hex`,
        "INVALID_CAN_ID",
        { input }
      );
    }

    const id = parseInt(clean, 16);
    if (id > MAX_CAN_ID) {
      throw new J1939Error(
        `CAN ID 0x${this.toHex(id, 8)} exceeds 29 bits`,
        "INVALID_CAN_ID",
        { input, id }
      );
    }
    return id;
  }

  /**
   * Parses a decimal or 0x-prefixed hex integer and checks it against an
   * inclusive range.
   */
  static parseInteger(
    input: string,
    label: string,
    min: number,
    max: number
  ): number {
    const clean = input.trim();
    let value = NaN;
    if (/^0x[0-9a-f]+$/i.test(clean)) value = parseInt(clean.slice(2), 16);
    else if (/^\d+$/.test(clean)) value = parseInt(clean, 10);

    if (isNaN(value)) {
      throw new J1939Error(`Invalid ${label}: '${input}'`, "INVALID_HEX", {
        input,
      });
    }
    if (value < min || value > max) {
      throw new J1939Error(
        `${label} out of range: must be ${min}-${max}, got ${value}`,
        "OUT_OF_RANGE",
        { label, value, min, max }
      );
    }
    return value;
  }

  static toHex(value: number, width: number): string {
    return value.toString(16).toUpperCase().padStart(width, "0");
  }

  static bytesToHex(bytes: Uint8Array | readonly number[]): string {
    return Array.from(bytes, (b) => this.toHex(b, 2)).join(" ");
  }
}
