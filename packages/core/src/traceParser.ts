import { CanIdCodec } from "./canId.js";
import { J1939Error } from "./errors.js";

/**
 * One CAN frame read from a trace
 */
export interface TraceEntry {
  /** 29-bit CAN identifier */
  canId: number;
  /** Payload, 0-8 bytes */
  data: Uint8Array;
  /** Line number in source trace */
  lineNumber: number;
  /** Timestamp as written in the trace */
  timestamp?: string;
  /** Interface name (e.g. can0) if present */
  channel?: string;
}

/**
 * Parser configuration options
 */
export interface TraceParserOptions {
  /** Throw on lines that match no known format instead of skipping them */
  strict?: boolean;
  /** Log skipped lines */
  debug?: boolean;
}

interface RawFrame {
  idHex: string;
  bytesHex: string[];
  declaredLength?: number;
  timestamp?: string;
  channel?: string;
}

// (1700000000.123456) can0 18FEEE00#8C7D00FF
const CANDUMP_LOG =
  /^\((\d+(?:\.\d+)?)\)\s+(\S+)\s+([0-9A-Fa-f]{3}|[0-9A-Fa-f]{8})#([0-9A-Fa-f]*)$/;

// can0  18FEEE00   [8]  8C 7D 00 FF FF FF FF FF
const CANDUMP_TEXT =
  /^(?:\((\d+(?:\.\d+)?)\)\s+)?([A-Za-z][\w.-]*)\s+([0-9A-Fa-f]{3}|[0-9A-Fa-f]{8})\s+\[(\d{1,2})\]((?:\s+[0-9A-Fa-f]{2})*)$/;

// [12:00:01.250] 18FEEE00 8C 7D 00 FF
const PLAIN =
  /^(?:\[([^\]]+)\]\s+)?(?:0[xX])?([0-9A-Fa-f]{3}|[0-9A-Fa-f]{8})((?:\s+[0-9A-Fa-f]{2})*)$/;

export class TraceParser {
  /**
   * Parses candump-style trace text into J1939 frames.
   *
   * Standard 11-bit frames, payloads over 8 bytes, blank lines and `#`
   * comments are skipped.
   *
   * @param text - Raw trace text content
   * @param options - Parser configuration
   * @returns Frames in trace order
   */
  static parse(text: string, options: TraceParserOptions = {}): TraceEntry[] {
    const { strict = false, debug = false } = options;
    const lines = text.split(/\r?\n/);
    const results: TraceEntry[] = [];

    const skip = (lineNumber: number, reason: string) => {
      if (debug) {
        console.log(`[TraceParser] Skipped line ${lineNumber}: ${reason}`);
      }
    };

    for (let lineIdx = 0; lineIdx < lines.length; lineIdx++) {
      const line = lines[lineIdx].trim();
      const lineNumber = lineIdx + 1;

      if (line === "" || line.startsWith("#")) continue;

      const frame = this.matchLine(line);
      const declaredMismatch =
        frame?.declaredLength !== undefined &&
        frame.declaredLength !== frame.bytesHex.length;

      if (!frame || declaredMismatch) {
        if (strict) {
          throw new J1939Error(
            `Unrecognised trace line ${lineNumber}: '${line}'`,
            "TRACE_PARSE",
            { lineNumber, line }
          );
        }
        skip(lineNumber, "unrecognised format");
        continue;
      }

      if (frame.idHex.length !== 8) {
        skip(lineNumber, `standard frame ${frame.idHex.toUpperCase()}`);
        continue;
      }

      const canId = parseInt(frame.idHex, 16);
      if (!CanIdCodec.isValidId(canId)) {
        if (strict) {
          throw new J1939Error(
            `CAN ID ${frame.idHex} on line ${lineNumber} exceeds 29 bits`,
            "TRACE_PARSE",
            { lineNumber, line }
          );
        }
        skip(lineNumber, `identifier ${frame.idHex} exceeds 29 bits`);
        continue;
      }

      if (frame.bytesHex.length > 8) {
        skip(lineNumber, `${frame.bytesHex.length}-byte payload`);
        continue;
      }

      const entry: TraceEntry = {
        canId,
        data: new Uint8Array(frame.bytesHex.map((b) => parseInt(b, 16))),
        lineNumber,
      };
      if (frame.timestamp !== undefined) entry.timestamp = frame.timestamp;
      if (frame.channel !== undefined) entry.channel = frame.channel;
      results.push(entry);
    }

    return results;
  }

  private static matchLine(line: string): RawFrame | null {
    const log = CANDUMP_LOG.exec(line);
    if (log) {
      const payload = log[4];
      if (payload.length % 2 !== 0) return null;
      return {
        timestamp: log[1],
        channel: log[2],
        idHex: log[3],
        bytesHex: payload.match(/.{2}/g) ?? [],
      };
    }

    const text = CANDUMP_TEXT.exec(line);
    if (text) {
      return {
        timestamp: text[1],
        channel: text[2],
        idHex: text[3],
        declaredLength: parseInt(text[4], 10),
        bytesHex: this.splitBytes(text[5]),
      };
    }

    const plain = PLAIN.exec(line);
    if (plain) {
      return {
        timestamp: plain[1],
        idHex: plain[2],
        bytesHex: this.splitBytes(plain[3]),
      };
    }

    return null;
  }

  private static splitBytes(group: string | undefined): string[] {
    return (group ?? "").split(/\s+/).filter((b) => b.length > 0);
  }
}
