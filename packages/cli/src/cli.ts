#!/usr/bin/env tsx
/**
 * pumplog CLI
 */

import { config } from "dotenv";
import { Command, Option, program } from "commander";
import { EventRegistry, type EventSchema } from "@pumplog/events";
import {
  createDecodeContext,
  runCatalog,
  runDecode,
  runRecords,
  type CommandOutput,
  type DecodeCommandOptions,
  type RecordsCommandOptions,
} from "./commands.js";
import { readEventInput, readSchemaCatalog } from "./input.js";

// .env.local wins over .env; neither overrides the real environment
config({ path: ".env.local" });
config();

/**
 * Print command output and set the exit code
 */
function emit(output: CommandOutput): void {
  output.stdout.forEach((line) => console.log(line));
  output.stderr.forEach((line) => console.error(line));
  process.exitCode = output.exitCode;
}

function fail(error: unknown): never {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

function loadExternalSchemas(path: string | undefined): EventSchema[] {
  return path ? readSchemaCatalog(path) : [];
}

/**
 * Options every decoding command accepts
 */
function withDecodeOptions(command: Command): Command {
  return command
    .argument("[file]", "base64 event blob (default: stdin)")
    .option("--binary", "read raw frame bytes instead of base64")
    .option("--tz <zone>", "IANA zone of the pump's clock (default: PUMP_TIMEZONE)")
    .option("--schemas <file>", "JSON catalogue of additional event schemas")
    .option("--strict", "stop at the first frame that fails to decode")
    .addOption(
      new Option("--trailing <policy>", "bytes after the last whole frame")
        .choices(["drop", "report", "error"])
        .default("report")
    );
}

program
  .name("pumplog")
  .description("Decode insulin pump event logs")
  .version("0.1.0");

withDecodeOptions(program.command("decode").description("Decode events to NDJSON"))
  .option("--include-raw", "include each frame's bytes as base64")
  .action((file: string | undefined, options: DecodeCommandOptions) => {
    try {
      const context = createDecodeContext(options, loadExternalSchemas(options.schemas));
      emit(runDecode(readEventInput(file, { binary: options.binary }), context));
    } catch (error) {
      fail(error);
    }
  });

withDecodeOptions(program.command("records").description("Extract glucose and insulin records to NDJSON"))
  .option("--serial <id>", "pump serial to stamp on each record")
  .action((file: string | undefined, options: RecordsCommandOptions) => {
    try {
      const context = createDecodeContext(options, loadExternalSchemas(options.schemas));
      emit(
        runRecords(readEventInput(file, { binary: options.binary }), context, {
          deviceSerial: options.serial,
        })
      );
    } catch (error) {
      fail(error);
    }
  });

program
  .command("catalog")
  .description("List the event types the decoder knows")
  .option("--schemas <file>", "JSON catalogue of additional event schemas")
  .action((options: { schemas?: string }) => {
    try {
      emit(runCatalog(EventRegistry.create({ external: loadExternalSchemas(options.schemas) })));
    } catch (error) {
      fail(error);
    }
  });

program.parse();
