import { BitExtractor } from "./bits.js";
import { J1939Error } from "./errors.js";
import {
  definitionTableSchema,
  fitsFrame,
  fitsWidth,
  isReachablePgn,
  type ParameterGroupInfo,
  type SpnDefinitionInput,
} from "./schema.js";

/**
 * Static definition of one SPN inside its PGN's payload
 */
export interface SpnDefinition {
  /** SPN number, unique within a database */
  readonly spn: number;
  readonly name: string;
  readonly unit: string;
  /** PGN that carries this SPN */
  readonly pgn: number;
  /** First byte of the field (0-based) */
  readonly startByte: number;
  /** First bit within `startByte` (0 = LSB) */
  readonly startBit: number;
  readonly lengthBits: number;
  readonly scale: number;
  readonly offset: number;
  /** Raw value the sender uses for "not available", all ones by convention */
  readonly notAvailableRaw: bigint;
}

export interface DatabaseStats {
  spnCount: number;
  pgnCount: number;
}

/**
 * Turns a validated table row into a frozen definition.
 */
export function toSpnDefinition(input: SpnDefinitionInput): SpnDefinition {
  const { notAvailableRaw, ...rest } = input;
  return Object.freeze({
    ...rest,
    notAvailableRaw:
      notAvailableRaw === undefined
        ? BitExtractor.allOnes(input.lengthBits)
        : BigInt(notAvailableRaw),
  });
}

const inRange = (n: number, min: number, max: number) =>
  Number.isInteger(n) && n >= min && n <= max;

function layoutProblem(def: SpnDefinition): string | null {
  if (!inRange(def.startByte, 0, 7)) return "startByte must be 0-7";
  if (!inRange(def.startBit, 0, 7)) return "startBit must be 0-7";
  if (!inRange(def.lengthBits, 1, 64)) return "lengthBits must be 1-64";
  if (!fitsFrame(def)) return "field does not fit in an 8-byte frame";
  if (!fitsWidth(def.notAvailableRaw, def.lengthBits)) {
    return "sentinel does not fit in lengthBits";
  }
  if (!isReachablePgn(def.pgn)) return "PDU1 PGN must have a zero low byte";
  return null;
}

/**
 * Immutable SPN registry, indexed by SPN number and by PGN.
 *
 * Both indices are built in the constructor and never change afterwards, so
 * one instance can be shared freely. Definitions are checked and stored as
 * frozen copies. `extend` returns a new registry.
 */
export class SpnDatabase {
  private readonly definitions: readonly SpnDefinition[];
  private readonly bySpn: ReadonlyMap<number, SpnDefinition>;
  private readonly byPgn: ReadonlyMap<number, readonly SpnDefinition[]>;
  private readonly groups: ReadonlyMap<number, ParameterGroupInfo>;

  constructor(
    definitions: readonly SpnDefinition[],
    parameterGroups: readonly ParameterGroupInfo[] = []
  ) {
    const bySpn = new Map<number, SpnDefinition>();
    const byPgn = new Map<number, SpnDefinition[]>();
    const stored: SpnDefinition[] = [];

    for (const input of definitions) {
      const problem = layoutProblem(input);
      if (problem) {
        throw new J1939Error(
          `Invalid definition for SPN ${input.spn}: ${problem}`,
          "INVALID_DATABASE",
          { spn: input.spn, issues: [problem] }
        );
      }
      const def: SpnDefinition = Object.freeze({ ...input });
      stored.push(def);

      const existing = bySpn.get(def.spn);
      if (existing) {
        throw new J1939Error(
          `Duplicate SPN ${def.spn} (${existing.name} / ${def.name})`,
          "DUPLICATE_SPN",
          { spn: def.spn }
        );
      }
      bySpn.set(def.spn, def);

      const list = byPgn.get(def.pgn);
      if (list) list.push(def);
      else byPgn.set(def.pgn, [def]);
    }

    for (const list of byPgn.values()) Object.freeze(list);

    this.definitions = Object.freeze(stored);
    this.bySpn = bySpn;
    this.byPgn = byPgn;
    this.groups = new Map(
      parameterGroups.map((g): [number, ParameterGroupInfo] => [
        g.pgn,
        Object.freeze({ ...g }),
      ])
    );
  }

  /**
   * Validates an arbitrary value (usually parsed JSON) against the table
   * schema and builds a registry from it.
   */
  static fromJson(value: unknown): SpnDatabase {
    const result = definitionTableSchema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(
        (i) => `${i.path.join(".")}: ${i.message}`
      );
      throw new J1939Error(
        `Invalid definition table: ${issues.join("; ")}`,
        "INVALID_DATABASE",
        { issues }
      );
    }

    return new SpnDatabase(
      result.data.spns.map(toSpnDefinition),
      result.data.parameterGroups
    );
  }

  getSpnDef(spn: number): SpnDefinition | null {
    return this.bySpn.get(spn) ?? null;
  }

  /** Definitions registered under a PGN, in table order (empty if unknown) */
  getSpnsForPgn(pgn: number): readonly SpnDefinition[] {
    return this.byPgn.get(pgn) ?? [];
  }

  getParameterGroup(pgn: number): ParameterGroupInfo | null {
    return this.groups.get(pgn) ?? null;
  }

  listSupportedPgns(): number[] {
    return [...this.byPgn.keys()].sort((a, b) => a - b);
  }

  listSpns(): number[] {
    return this.definitions.map((d) => d.spn);
  }

  databaseStats(): DatabaseStats {
    return { spnCount: this.bySpn.size, pgnCount: this.byPgn.size };
  }

  /**
   * New registry holding this one's definitions followed by `other`'s.
   * SPN numbers must stay unique; group metadata from `other` wins.
   */
  extend(other: SpnDatabase): SpnDatabase {
    return new SpnDatabase(
      [...this.definitions, ...other.definitions],
      [...this.groups.values(), ...other.groups.values()]
    );
  }
}
