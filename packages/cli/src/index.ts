#!/usr/bin/env -S node --import tsx
import { Command } from "commander";
import inquirer from "inquirer";
import {
  runDecode,
  runParseId,
  runParseLog,
  runPgns,
  runRequest,
  runSpn,
  type GlobalOptions,
} from "./commands.js";

const program = new Command();

program
  .name("j1939")
  .description("SAE J1939 frame decoder")
  .version("1.0.0")
  .option("--json", "Output results as JSON")
  .option("--table <file>", "Extra SPN definition table (JSON)");

const globals = () => program.opts<GlobalOptions>();

async function runInteractive() {
  const { mode } = await inquirer.prompt<{ mode: string }>([
    {
      type: "list",
      name: "mode",
      message: "Select Operation:",
      choices: ["Decode frame", "Parse CAN ID", "Build request", "Look up SPN"],
    },
  ]);

  if (mode === "Decode frame") {
    const answers = await inquirer.prompt<{ canId: string; data: string }>([
      { name: "canId", message: "CAN ID (hex):", default: "0CF00400" },
      {
        name: "data",
        message: "Data bytes (hex):",
        default: "00 00 00 20 4E 00 00 00",
      },
    ]);
    runDecode(answers.canId, answers.data, {});
  } else if (mode === "Parse CAN ID") {
    const answers = await inquirer.prompt<{ canId: string }>([
      { name: "canId", message: "CAN ID (hex):", default: "18FEEE00" },
    ]);
    runParseId(answers.canId, {});
  } else if (mode === "Build request") {
    const answers = await inquirer.prompt<{
      source: string;
      destination: string;
      pgn: string;
    }>([
      { name: "source", message: "Our source address:", default: "0xFE" },
      { name: "destination", message: "Target address:", default: "0x00" },
      { name: "pgn", message: "Requested PGN:", default: "65253" },
    ]);
    runRequest(answers);
  } else {
    const answers = await inquirer.prompt<{ spn: string }>([
      { name: "spn", message: "SPN:", default: "190" },
    ]);
    runSpn(answers.spn, {});
  }
}

program
  .command("decode")
  .description("Decode all known SPNs in one frame")
  .argument("<canId>", "29-bit CAN ID (hex)")
  .argument("<data>", "Payload bytes (hex, up to 8)")
  .action((canId: string, data: string) => runDecode(canId, data, globals()));

program
  .command("parse-id")
  .description("Split a CAN ID into its J1939 fields")
  .argument("<canId>", "29-bit CAN ID (hex)")
  .action((canId: string) => runParseId(canId, globals()));

program
  .command("request")
  .description("Build a Request PGN frame")
  .requiredOption("-s, --source <addr>", "Our source address")
  .requiredOption("-d, --destination <addr>", "Target address (0xFF = global)")
  .requiredOption("-p, --pgn <pgn>", "PGN to request")
  .option("--priority <n>", "Message priority (default 6)")
  .action(
    (options: {
      source: string;
      destination: string;
      pgn: string;
      priority?: string;
    }) => runRequest({ ...globals(), ...options })
  );

program
  .command("spn")
  .description("Show an SPN definition")
  .argument("<spn>", "SPN number")
  .action((spn: string) => runSpn(spn, globals()));

program
  .command("pgns")
  .description("List supported PGNs")
  .action(() => runPgns(globals()));

program
  .command("parse-log")
  .description("Decode every J1939 frame in a candump trace")
  .argument("<file>", "Path to trace file")
  .option("--strict", "Fail on unrecognised lines")
  .option("--debug", "Report skipped lines")
  .action((file: string, options: { strict?: boolean; debug?: boolean }) =>
    runParseLog(file, { ...globals(), ...options })
  );

// Check if run without args (interactive mode)
if (process.argv.length <= 2) {
  runInteractive().catch((e: unknown) => {
    console.error("Error:", e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
} else {
  program.parse();
}
