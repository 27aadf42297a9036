import { Command } from "commander";
import { processIndexBuild } from "./processors/index-build.js";
import { processIngest } from "./processors/ingest.js";
import type { ProcessorOptions } from "./processors/options.js";

/**
 * `ingestkit-worker ingest <documentSetId>` and `ingestkit-worker index <indexId>`.
 * The exit code of the command that ran lands in `onExit`.
 */
export function createProgram(options: ProcessorOptions, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("ingestkit-worker")
    .description("Run one document ingestion or index build job")
    .version("0.1.0");

  program
    .command("ingest")
    .description("Fetch, chunk, embed and upsert a document set")
    .argument("<documentSetId>", "Name of the document set to ingest")
    .action(async (documentSetId: string) => {
      onExit(await processIngest(documentSetId, options));
    });

  program
    .command("index")
    .description("Tune a collection, wait for it to settle and swap the serving alias")
    .argument("<indexId>", "Name of the index build job")
    .action(async (indexId: string) => {
      onExit(await processIndexBuild(indexId, options));
    });

  return program;
}
