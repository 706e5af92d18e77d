import { readFileSync } from "node:fs";
import {
  CanIdCodec,
  DEFAULT_DATABASE,
  RequestBuilder,
  SpnDatabase,
  SpnDecoder,
  TraceParser,
  Utils,
  type CanIdentifier,
  type DecodedSpn,
} from "@j1939-decoder/core";

export type GlobalOptions = {
  json?: boolean;
  /** Extra definition table (JSON) layered over the built-in one */
  table?: string;
};

export type TraceOptions = GlobalOptions & {
  strict?: boolean;
  debug?: boolean;
};

/**
 * Built-in database, extended with the definitions in `tablePath` if given.
 */
export function loadDatabase(tablePath?: string): SpnDatabase {
  if (!tablePath) return DEFAULT_DATABASE;
  const content = readFileSync(tablePath, "utf-8");
  return DEFAULT_DATABASE.extend(SpnDatabase.fromJson(JSON.parse(content)));
}

// bigint fields (raw values, sentinels) are written as decimal strings
function toJson(value: unknown, pretty = false): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v),
    pretty ? 2 : undefined
  );
}

function fail(e: unknown, json: boolean): void {
  const message = e instanceof Error ? e.message : String(e);
  if (json) console.log(toJson({ error: message }));
  else console.error("Error:", message);
  process.exitCode = 1;
}

const hex2 = (n: number) => `0x${Utils.toHex(n, 2)}`;

function pgnLabel(pgn: number, db: SpnDatabase): string {
  const group = db.getParameterGroup(pgn);
  const base = `${pgn} (0x${Utils.toHex(pgn, 4)})`;
  return group ? `${base} ${group.acronym} - ${group.label}` : base;
}

function spnLine(d: DecodedSpn): string {
  return `  SPN ${d.spn} ${d.name}: ${d.value} ${d.unit}`.trimEnd();
}

function idLines(id: CanIdentifier, db: SpnDatabase): string[] {
  return [
    `Priority: ${id.priority}`,
    `Data page: ${id.dataPage}`,
    `PDU format: ${hex2(id.pduFormat)} (${id.pduType})`,
    `PDU specific: ${hex2(id.pduSpecific)}`,
    `Destination: ${hex2(id.destinationAddress)}`,
    `Source: ${hex2(id.sourceAddress)}`,
    `PGN: ${pgnLabel(id.pgn, db)}`,
  ];
}

export function runParseId(canIdStr: string, options: GlobalOptions): void {
  const json = options.json ?? false;
  try {
    const db = loadDatabase(options.table);
    const id = CanIdCodec.parse(Utils.parseCanId(canIdStr));

    if (json) console.log(toJson(id));
    else idLines(id, db).forEach((line) => console.log(line));
  } catch (e) {
    fail(e, json);
  }
}

export function runDecode(
  canIdStr: string,
  dataStr: string,
  options: GlobalOptions
): void {
  const json = options.json ?? false;
  try {
    const db = loadDatabase(options.table);
    const canId = Utils.parseCanId(canIdStr);
    const data = Utils.parseHexBytes(dataStr);
    const id = CanIdCodec.parse(canId);
    const spns = SpnDecoder.decodeFrame(canId, data, db);

    if (json) {
      console.log(toJson({ canId: Utils.toHex(canId, 8), id, spns }));
      return;
    }

    console.log(`PGN ${pgnLabel(id.pgn, db)} from ${hex2(id.sourceAddress)}`);
    if (spns.length === 0) {
      console.log("No decodable SPNs in this frame.");
      return;
    }
    spns.forEach((d) => console.log(spnLine(d)));
  } catch (e) {
    fail(e, json);
  }
}

export function runRequest(
  options: GlobalOptions & {
    source: string;
    destination: string;
    pgn: string;
    priority?: string;
  }
): void {
  const json = options.json ?? false;
  try {
    const sa = Utils.parseInteger(options.source, "source address", 0, 0xff);
    const da = Utils.parseInteger(
      options.destination,
      "destination address",
      0,
      0xff
    );
    const pgn = Utils.parseInteger(options.pgn, "PGN", 0, 0x3ffff);
    const priority =
      options.priority === undefined
        ? undefined
        : Utils.parseInteger(options.priority, "priority", 0, 7);

    const frame = RequestBuilder.buildRequestPgn(sa, da, pgn, { priority });
    const idHex = Utils.toHex(frame.canId, 8);
    const dataHex = Utils.bytesToHex(frame.data);

    if (json) {
      console.log(toJson({ canId: idHex, data: Array.from(frame.data) }));
    } else {
      console.log(`CAN ID: ${idHex}`);
      console.log(`Data: ${dataHex}`);
      console.log(`candump: ${idHex}#${dataHex.replace(/ /g, "")}`);
    }
  } catch (e) {
    fail(e, json);
  }
}

export function runSpn(spnStr: string, options: GlobalOptions): void {
  const json = options.json ?? false;
  try {
    const db = loadDatabase(options.table);
    const spn = Utils.parseInteger(spnStr, "SPN", 0, 0xffffffff);
    const def = db.getSpnDef(spn);
    if (!def) throw new Error(`Unknown SPN ${spn}`);

    if (json) {
      console.log(toJson(def));
      return;
    }
    console.log(`SPN ${def.spn}: ${def.name}`);
    console.log(`PGN: ${pgnLabel(def.pgn, db)}`);
    console.log(
      `Position: byte ${def.startByte}, bit ${def.startBit}, ${def.lengthBits} bits`
    );
    console.log(
      `Scale: ${def.scale}, offset: ${def.offset}, unit: ${def.unit || "-"}`
    );
    console.log(
      `Not available: 0x${def.notAvailableRaw.toString(16).toUpperCase()}`
    );
  } catch (e) {
    fail(e, json);
  }
}

export function runPgns(options: GlobalOptions): void {
  const json = options.json ?? false;
  try {
    const db = loadDatabase(options.table);
    const pgns = db.listSupportedPgns().map((pgn) => ({
      pgn,
      group: db.getParameterGroup(pgn),
      spns: db.getSpnsForPgn(pgn).map((d) => d.spn),
    }));
    const stats = db.databaseStats();

    if (json) {
      console.log(toJson({ stats, pgns }, true));
      return;
    }
    pgns.forEach((p) =>
      console.log(`${pgnLabel(p.pgn, db)}: ${p.spns.length} SPNs`)
    );
    console.log(`${stats.spnCount} SPNs in ${stats.pgnCount} PGNs`);
  } catch (e) {
    fail(e, json);
  }
}

export function runParseLog(filePath: string, options: TraceOptions): void {
  const json = options.json ?? false;
  try {
    const db = loadDatabase(options.table);
    const content = readFileSync(filePath, "utf-8");
    const frames = TraceParser.parse(content, {
      strict: options.strict,
      debug: options.debug,
    });

    const results = frames.map((frame) => {
      const id = CanIdCodec.parse(frame.canId);
      return {
        lineNumber: frame.lineNumber,
        timestamp: frame.timestamp,
        canId: Utils.toHex(frame.canId, 8),
        pgn: id.pgn,
        sourceAddress: id.sourceAddress,
        spns: SpnDecoder.decodeFrame(frame.canId, frame.data, db),
      };
    });

    if (json) {
      console.log(toJson(results, true));
      return;
    }

    if (results.length === 0) {
      console.log("No J1939 frames found in log.");
      return;
    }
    for (const r of results) {
      console.log(
        `[line ${r.lineNumber}] ${r.canId} PGN ${pgnLabel(r.pgn, db)} from ${hex2(r.sourceAddress)}`
      );
      r.spns.forEach((d) => console.log(spnLine(d)));
    }
    const decoded = results.filter((r) => r.spns.length > 0).length;
    console.log(`Decoded ${decoded} of ${results.length} frames`);
  } catch (e) {
    fail(e, json);
  }
}
