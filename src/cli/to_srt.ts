#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import fs from "node:fs";
import path from "node:path";

import { MIN_MERGE_LENGTH_ENV, resolveMinMergeLength } from "../config";
import { parseRecognitionResult } from "../recognition";
import { DEFAULT_UI_MIN_MERGE_LENGTH, clampMinMergeLength } from "../segmenter";
import { exportDocument, srt } from "../subtitles";
import { ExportFormat } from "../types";

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function buildCommand(): Command {
  const program = new Command();
  program
    .name("to_srt")
    .description("Convert a speech-recognition JSON result into an SRT subtitle file.")
    .option("--input <path>", "Path to the recognition result JSON", "response.json")
    .option("--output <path>", "Path for the generated file (default depends on --format)")
    .option(
      "--min-merge-length <chars>",
      `Commas only end a subtitle once it is at least this many characters long (default: $${MIN_MERGE_LENGTH_ENV} or ${DEFAULT_UI_MIN_MERGE_LENGTH})`,
      parseInteger
    )
    .addOption(
      new Option("--format <format>", "Output format").choices(["srt", "txt"]).default("srt")
    )
    .option("--clamp", "Clamp --min-merge-length into the 8-80 range.", false);
  return program;
}

async function main(argv: string[]): Promise<number> {
  try {
    const program = buildCommand();
    program.exitOverride();

    const options = program.parse(argv).opts<{
      input: string;
      output?: string;
      minMergeLength?: number;
      format: ExportFormat;
      clamp: boolean;
    }>();

    const inputPath = path.resolve(options.input);
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }

    if (options.format === "srt") {
      const requested = options.minMergeLength ?? resolveMinMergeLength();
      const minMergeLength = options.clamp ? clampMinMergeLength(requested) : requested;
      srt(inputPath, options.output, { minMergeLength });
      return 0;
    }

    console.info(`Loading recognition result from ${inputPath}`);
    const recognition = parseRecognitionResult(JSON.parse(fs.readFileSync(inputPath, "utf-8")));
    const document = exportDocument(recognition.text, options.format);
    const outputPath = path.resolve(options.output ?? document.fileName);
    fs.writeFileSync(outputPath, document.content, { encoding: "utf-8" });
    console.info(`Wrote ${options.format} output to ${outputPath}`);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === "commander.helpDisplayed" ? 0 : 1;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => process.exit(code),
    (error) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export default main;
