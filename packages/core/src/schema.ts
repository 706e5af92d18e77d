import { z } from "zod";
import { BitExtractor } from "./bits.js";

const HEX_SENTINEL = /^0x[0-9a-f]+$/i;

const notAvailableRawSchema = z.union([
  z.number().int().nonnegative().safe(),
  z.string().regex(HEX_SENTINEL, "expected a 0x-prefixed hex string"),
]);

interface FieldLayout {
  startByte: number;
  startBit: number;
  lengthBits: number;
}

/** Whether the field ends inside an 8-byte payload */
export function fitsFrame(d: FieldLayout): boolean {
  return d.startByte * 8 + d.startBit + d.lengthBits <= 64;
}

/**
 * PDU1 PGNs carry the destination in the low byte of the identifier, so a
 * PDU1 PGN with a non-zero low byte never comes out of an identifier.
 */
export function isReachablePgn(pgn: number): boolean {
  return ((pgn >> 8) & 0xff) >= 240 || (pgn & 0xff) === 0;
}

/** Whether `raw` can appear in a field of `lengthBits` bits */
export function fitsWidth(raw: bigint, lengthBits: number): boolean {
  return raw >= 0n && raw <= BitExtractor.allOnes(lengthBits);
}

// Field-level issues are reported by the object schema; only a sentinel that
// parsed cleanly against a valid width is checked here.
function sentinelFits(raw: number | string | undefined, lengthBits: number) {
  if (raw === undefined) return true;
  if (!Number.isInteger(lengthBits) || lengthBits < 1 || lengthBits > 64) {
    return true;
  }
  if (typeof raw === "string") {
    return !HEX_SENTINEL.test(raw) || fitsWidth(BigInt(raw), lengthBits);
  }
  return !Number.isSafeInteger(raw) || fitsWidth(BigInt(raw), lengthBits);
}

export const spnDefinitionSchema = z
  .object({
    spn: z.number().int().nonnegative(),
    name: z.string().min(1),
    pgn: z.number().int().min(0).max(0x1ffff),
    startByte: z.number().int().min(0).max(7),
    startBit: z.number().int().min(0).max(7),
    lengthBits: z.number().int().min(1).max(64),
    scale: z.number().finite(),
    offset: z.number().finite(),
    unit: z.string(),
    notAvailableRaw: notAvailableRawSchema.optional(),
  })
  .refine(fitsFrame, {
    message: "field does not fit in an 8-byte frame",
    path: ["lengthBits"],
  })
  .refine((d) => sentinelFits(d.notAvailableRaw, d.lengthBits), {
    message: "sentinel does not fit in lengthBits",
    path: ["notAvailableRaw"],
  })
  .refine((d) => isReachablePgn(d.pgn), {
    message: "PDU1 PGN must have a zero low byte",
    path: ["pgn"],
  });

export const parameterGroupSchema = z
  .object({
    pgn: z.number().int().min(0).max(0x1ffff),
    acronym: z.string().min(1),
    label: z.string(),
    rate: z.string().optional(),
  })
  .refine((g) => isReachablePgn(g.pgn), {
    message: "PDU1 PGN must have a zero low byte",
    path: ["pgn"],
  });

export const definitionTableSchema = z.object({
  parameterGroups: z.array(parameterGroupSchema).default([]),
  spns: z.array(spnDefinitionSchema),
});

export type SpnDefinitionInput = z.infer<typeof spnDefinitionSchema>;
export type ParameterGroupInfo = z.infer<typeof parameterGroupSchema>;
export type DefinitionTable = z.infer<typeof definitionTableSchema>;
