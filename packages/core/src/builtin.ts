import { readFileSync } from "node:fs";
import { SpnDatabase } from "./database.js";

// Common engine/generator PGNs: EEC1-3, ET1, EFL/P1, IC1, VEP1, AMB, LFE,
// HOURS, FC, VH, DD and CCVS.
const BUILTIN_TABLE_URL = new URL("./data/spn-database.json", import.meta.url);

export const DEFAULT_DATABASE: SpnDatabase = SpnDatabase.fromJson(
  JSON.parse(readFileSync(BUILTIN_TABLE_URL, "utf-8"))
);
