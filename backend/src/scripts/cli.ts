#!/usr/bin/env node
import fs from "fs/promises";
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { loadConfig, loadEnvFile } from "../config";
import { getErrorMessage } from "../errors";
import { createPhotoSearchService, type PhotoSearchService } from "../services/photoSearch";
import type { Outcome, SearchResult } from "../types";

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

async function openService(): Promise<PhotoSearchService> {
  loadEnvFile();
  return createPhotoSearchService(loadConfig());
}

function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    console.error(`❌ ${outcome.kind} error: ${outcome.message}`);
    process.exit(1);
  }
  return outcome.value;
}

function printResults(results: SearchResult[], verbose: boolean): void {
  if (results.length === 0) {
    console.log("No matching photos.");
    return;
  }
  for (const r of results) {
    console.log(`${r.photoPath}: Distance ${r.distance.toFixed(4)}`);
    if (verbose) console.log(`Description (${r.aspectName}): ${r.description}`);
    console.log();
  }
}

export function createProgram(): Command {
  const program = new Command("photo-search");
  program.description("Index photos under named aspects and search them by image or text");

  program
    .command("index")
    .description("Index every image under a directory for one aspect")
    .argument("<directory>", "photo directory")
    .option("--aspect <name>", "aspect to index", "default")
    .option("--prompt <text>", "custom prompt for the image description")
    .option("--max-workers <n>", "number of concurrent workers", positiveInt)
    .option("--skip-existing", "skip photos already indexed under this aspect", false)
    .action(async (directory: string, opts: { aspect: string; prompt?: string; maxWorkers?: number; skipExisting: boolean }) => {
      const service = await openService();
      const summary = unwrap(
        await service.runIndexing({
          directory,
          aspect: opts.aspect,
          prompt: opts.prompt,
          concurrency: opts.maxWorkers,
          skipExisting: opts.skipExisting,
        })
      );
      console.log(`\nIndexing complete:`);
      console.log(`Successfully processed: ${summary.indexed} images`);
      console.log(`Skipped: ${summary.skipped} images`);
      console.log(`Errors encountered: ${summary.failed} images`);
    });

  program
    .command("add-aspect")
    .description("Describe one photo under a new or existing aspect")
    .argument("<photo>", "photo path")
    .requiredOption("--aspect <name>", "aspect name")
    .requiredOption("--prompt <text>", "prompt for this aspect")
    .action(async (photo: string, opts: { aspect: string; prompt: string }) => {
      const service = await openService();
      const record = unwrap(await service.indexPhoto(path.resolve(photo), opts.aspect, opts.prompt));
      console.log(`Added aspect '${record.aspectName}' to ${record.photoPath}`);
    });

  program
    .command("search")
    .description("Find photos similar to a query image")
    .argument("<image>", "query image path")
    .option("--aspect <name>", "aspect to search by", "default")
    .option("--k <n>", "number of results", positiveInt, 5)
    .option("--verbose", "print descriptions", false)
    .action(async (image: string, opts: { aspect: string; k: number; verbose: boolean }) => {
      const service = await openService();
      let bytes: Buffer;
      try {
        bytes = await fs.readFile(image);
      } catch (error) {
        console.error(`❌ Cannot read ${image}: ${getErrorMessage(error)}`);
        process.exit(1);
      }
      printResults(unwrap(await service.searchByImage(bytes, { aspect: opts.aspect, k: opts.k })), opts.verbose);
    });

  program
    .command("search-text")
    .description("Find photos matching a text description")
    .argument("<text>", "query text")
    .option("--aspect <name>", "aspect to search by", "default")
    .option("--k <n>", "number of results", positiveInt, 5)
    .option("--verbose", "print descriptions", false)
    .action(async (text: string, opts: { aspect: string; k: number; verbose: boolean }) => {
      const service = await openService();
      printResults(unwrap(await service.searchByText(text, { aspect: opts.aspect, k: opts.k })), opts.verbose);
    });

  program
    .command("list")
    .description("List indexed photo paths")
    .action(async () => {
      const service = await openService();
      for (const p of unwrap(await service.listPhotoPaths())) console.log(p);
    });

  program
    .command("delete")
    .description("Delete one aspect of a photo, or all of its aspects")
    .argument("<photo>", "photo path")
    .option("--aspect <name>", "only this aspect")
    .action(async (photo: string, opts: { aspect?: string }) => {
      const service = await openService();
      const deleted = unwrap(await service.delete(path.resolve(photo), opts.aspect));
      console.log(deleted === 0 ? `No records found for ${photo}` : `Deleted ${deleted} record(s)`);
    });

  program
    .command("clear")
    .description("Remove every record from the store")
    .action(async () => {
      const service = await openService();
      unwrap(await service.clear());
      console.log("Store cleared.");
    });

  program
    .command("list-models")
    .description("List models available on the provider")
    .action(async () => {
      const service = await openService();
      console.log("Available models:");
      for (const model of unwrap(await service.listAvailableModels())) console.log(`- ${model}`);
    });

  return program;
}

// Run if called directly
if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error("❌", getErrorMessage(error));
      process.exit(1);
    });
}
