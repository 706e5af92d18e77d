import { describe, it, expect, vi, afterEach } from "vitest";
import { J1939Error } from "../errors.js";
import { TraceParser } from "../traceParser.js";

describe("TraceParser", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should parse candump log lines", () => {
    const trace = "(1700000000.123456) can0 18FEEE00#8C7D00FF";
    const result = TraceParser.parse(trace);
    expect(result).toHaveLength(1);
    expect(result[0].canId).toBe(0x18feee00);
    expect(Array.from(result[0].data)).toEqual([0x8c, 0x7d, 0x00, 0xff]);
    expect(result[0].timestamp).toBe("1700000000.123456");
    expect(result[0].channel).toBe("can0");
    expect(result[0].lineNumber).toBe(1);
  });

  it("should parse candump default output", () => {
    const trace = `
      can0  0CF00400   [8]  00 00 00 20 4E 00 00 00
      can1  18FEE500   [2]  10 27
    `;
    const result = TraceParser.parse(trace);
    expect(result).toHaveLength(2);
    expect(result[0].canId).toBe(0x0cf00400);
    expect(Array.from(result[0].data)).toEqual([0, 0, 0, 0x20, 0x4e, 0, 0, 0]);
    expect(result[0].lineNumber).toBe(2);
    expect(result[0].timestamp).toBeUndefined();
    expect(result[1].channel).toBe("can1");
    expect(Array.from(result[1].data)).toEqual([0x10, 0x27]);
  });

  it("should parse plain timestamped lines", () => {
    const trace = `
      [12:00:01.250] 18FEEE00 8C 7D
      0x18EA00FE E5 FE 00
    `;
    const result = TraceParser.parse(trace);
    expect(result).toHaveLength(2);
    expect(result[0].timestamp).toBe("12:00:01.250");
    expect(result[0].canId).toBe(0x18feee00);
    expect(result[1].canId).toBe(0x18ea00fe);
    expect(Array.from(result[1].data)).toEqual([0xe5, 0xfe, 0x00]);
  });

  it("should skip comments, standard frames and oversized payloads", () => {
    const trace = `
      # captured on the test bench
      7E8 04 67 01 AB CD
      (1700000000.000001) can0 7E0#0227
      18FEEE00 01 02 03 04 05 06 07 08 09
      18FEEE00 8C
    `;
    const result = TraceParser.parse(trace);
    expect(result).toHaveLength(1);
    expect(result[0].lineNumber).toBe(6);
  });

  it("should skip lines whose declared length does not match", () => {
    const result = TraceParser.parse("can0  18FEEE00   [8]  8C 7D");
    expect(result).toHaveLength(0);
  });

  it("should throw in strict mode on unrecognised lines", () => {
    const trace = "18FEEE00 8C\nnot a frame";
    expect(() => TraceParser.parse(trace, { strict: true })).toThrow(J1939Error);
    expect(TraceParser.parse(trace)).toHaveLength(1);
  });

  it("should reject identifiers wider than 29 bits", () => {
    expect(TraceParser.parse("FFFFFFFF 00")).toHaveLength(0);
    expect(() => TraceParser.parse("FFFFFFFF 00", { strict: true })).toThrow(
      J1939Error
    );
  });

  it("should log skipped lines in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    TraceParser.parse("7E8 04 67 01 AB CD", { debug: true });
    expect(log).toHaveBeenCalledWith("[TraceParser] Skipped line 1: standard frame 7E8");
  });
});
