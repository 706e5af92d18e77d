import { describe, it, expect } from "vitest";
import { CanIdCodec, J1939_ADDRESS } from "../canId.js";

describe("CanIdCodec", () => {
  describe("parse", () => {
    it("should split EEC1 from SA 0x00 (0x0CF00400)", () => {
      expect(CanIdCodec.parse(0x0cf00400)).toEqual({
        priority: 3,
        reserved: 0,
        dataPage: 0,
        pduFormat: 0xf0,
        pduSpecific: 0x04,
        sourceAddress: 0x00,
        pgn: 61444,
        pduType: "PDU2",
        destinationAddress: J1939_ADDRESS.GLOBAL,
      });
    });

    it("should parse ET1 (0x18FEEE00)", () => {
      const id = CanIdCodec.parse(0x18feee00);
      expect(id.priority).toBe(6);
      expect(id.pgn).toBe(65262);
      expect(id.sourceAddress).toBe(0x00);
    });

    it("should treat a Request PGN as peer-to-peer", () => {
      const id = CanIdCodec.parse(0x18ea00fe);
      expect(id.pduType).toBe("PDU1");
      expect(id.pgn).toBe(0xea00);
      expect(id.destinationAddress).toBe(0x00);
      expect(id.sourceAddress).toBe(0xfe);
    });

    it("should switch to PDU2 exactly at PF 240", () => {
      const base = { priority: 6, dataPage: 0, pduSpecific: 0x12, sourceAddress: 1 };

      const pdu1 = CanIdCodec.parse(CanIdCodec.build({ ...base, pduFormat: 239 }));
      expect(pdu1.pduType).toBe("PDU1");
      expect(pdu1.pgn).toBe(0xef00);
      expect(pdu1.destinationAddress).toBe(0x12);

      const pdu2 = CanIdCodec.parse(CanIdCodec.build({ ...base, pduFormat: 240 }));
      expect(pdu2.pduType).toBe("PDU2");
      expect(pdu2.pgn).toBe(0xf012);
      expect(pdu2.destinationAddress).toBe(0xff);
    });

    it("should include the data page in the PGN", () => {
      const id = CanIdCodec.parse(0x0dfeca21);
      expect(id.dataPage).toBe(1);
      expect(id.pgn).toBe(0x1feca);
      expect(id.sourceAddress).toBe(0x21);
    });

    it("should carry the reserved bit without using it for the PGN", () => {
      const id = CanIdCodec.parse(0x02000000);
      expect(id.reserved).toBe(1);
      expect(id.pgn).toBe(0);
    });

    it("should ignore the top 3 bits of a 32-bit value", () => {
      expect(CanIdCodec.parse(0xecf00400)).toEqual(CanIdCodec.parse(0x0cf00400));
    });
  });

  describe("build", () => {
    it("should rebuild every parsed identifier unchanged", () => {
      for (const id of [0x0cf00400, 0x18feee00, 0x18ea00fe, 0x1fffffff, 0, 0x02000000]) {
        expect(CanIdCodec.build(CanIdCodec.parse(id))).toBe(id);
      }
    });

    it("should round-trip fields through parse", () => {
      for (const priority of [0, 3, 7]) {
        for (const pduFormat of [0, 239, 240, 255]) {
          for (const dataPage of [0, 1]) {
            const fields = {
              priority,
              reserved: 1,
              dataPage,
              pduFormat,
              pduSpecific: 0xa5,
              sourceAddress: 0x3c,
            };
            const parsed = CanIdCodec.parse(CanIdCodec.build(fields));
            expect(parsed).toMatchObject(fields);
            expect(parsed.pgn).toBe(
              pduFormat >= 240
                ? (dataPage << 16) | (pduFormat << 8) | 0xa5
                : (dataPage << 16) | (pduFormat << 8)
            );
          }
        }
      }
    });

    it("should mask out-of-range fields", () => {
      const id = CanIdCodec.build({
        priority: 9,
        dataPage: 2,
        pduFormat: 0x1f0,
        pduSpecific: 0x100,
        sourceAddress: 0x1fe,
      });
      expect(id).toBe(0x04f000fe);
    });
  });

  describe("buildForPgn", () => {
    it("should use the PGN low byte as PS for PDU2", () => {
      expect(
        CanIdCodec.buildForPgn({ priority: 3, pgn: 61444, sourceAddress: 0x00 })
      ).toBe(0x0cf00400);
    });

    it("should default the PDU1 destination to global", () => {
      expect(
        CanIdCodec.buildForPgn({ priority: 6, pgn: 0xea00, sourceAddress: 0xfe })
      ).toBe(0x18eafffe);
    });
  });

  describe("helpers", () => {
    it("should extract PGN and source address", () => {
      expect(CanIdCodec.extractPgn(0x0cf00400)).toBe(61444);
      expect(CanIdCodec.extractPgn(0x18feee00)).toBe(65262);
      expect(CanIdCodec.extractPgn(0x18ea00fe)).toBe(0xea00);
      expect(CanIdCodec.extractSourceAddress(0x18ea00fe)).toBe(0xfe);
    });

    it("should validate the 29-bit range", () => {
      expect(CanIdCodec.isValidId(0x1fffffff)).toBe(true);
      expect(CanIdCodec.isValidId(0x20000000)).toBe(false);
      expect(CanIdCodec.isValidId(-1)).toBe(false);
      expect(CanIdCodec.isValidId(1.5)).toBe(false);
    });

    it("should classify PGNs as broadcast or peer-to-peer", () => {
      expect(CanIdCodec.isBroadcastPgn(61444)).toBe(true);
      expect(CanIdCodec.isBroadcastPgn(0xea00)).toBe(false);
    });
  });
});
