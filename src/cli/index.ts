import type { WriteStream } from "node:fs";
import { analyzeFiles } from "../savegame/analyzer.js";
import { summaryToJson } from "../savegame/summary.js";
import { createWriteStream, endStream, watchStreamError, writeJsonLine } from "../io/streams.js";

// Keeps xz-compat from installing a native LZMA binding, and logging about it, on first use.
process.env.LZMA_NATIVE_DISABLE ??= "1";

const args = process.argv.slice(2);
const consumedArgs = new Set<number>();

const readFlagValue = (flag: string): string | undefined => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return undefined;
  }

  consumedArgs.add(index);
  const value = args[index + 1];
  if (value) {
    consumedArgs.add(index + 1);
  }
  return value;
};

const hasFlag = (flag: string): boolean => {
  const index = args.indexOf(flag);
  if (index === -1) {
    return false;
  }
  consumedArgs.add(index);
  return true;
};

const usage = (): never => {
  console.error(
    "Usage: savegame-analyzer [--fail-fast] [--max-payload <bytes>] [--output <summaries.jsonl>] <savegame>..."
  );
  process.exit(1);
};

const outputPath = readFlagValue("--output");
const maxPayloadFlag = readFlagValue("--max-payload");
const failFast = hasFlag("--fail-fast");
const inputPaths = args.filter((value, index) => !consumedArgs.has(index) && !value.startsWith("--"));

let maxPayloadLength: number | undefined;
if (maxPayloadFlag !== undefined) {
  maxPayloadLength = Number(maxPayloadFlag);
  if (!Number.isSafeInteger(maxPayloadLength) || maxPayloadLength <= 0) {
    console.error(`Invalid --max-payload value: ${maxPayloadFlag}`);
    usage();
  }
}

if (inputPaths.length === 0) {
  usage();
}

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const printReport = (analyzed: number, failed: number, byCompression: Map<string, number>): void => {
  console.log("Analysis Report:");
  console.log(`  Analyzed: ${analyzed}`);
  console.log(`  Failed:   ${failed}`);
  const skipped = inputPaths.length - analyzed - failed;
  if (skipped > 0) {
    console.log(`  Skipped:  ${skipped}`);
  }
  for (const [compression, count] of [...byCompression].sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`    ${compression}: ${count}`);
  }
};

const run = async (): Promise<void> => {
  const cleanupHandlers: Array<() => void> = [];
  let output: WriteStream | undefined;
  let outputError: Promise<never> | undefined;
  let analyzed = 0;
  let failed = 0;
  const byCompression = new Map<string, number>();

  try {
    if (outputPath) {
      output = createWriteStream(outputPath, abortController.signal);
      outputError = watchStreamError(output, `Failed to write output file "${outputPath}"`, cleanupHandlers);
      // A failed output ends the batch; the error itself is raised by the next write or the final end.
      void outputError.catch(() => abortController.abort());
      console.log(`Output summaries: ${outputPath}`);
    }

    for await (const { path, result } of analyzeFiles(inputPaths, { failFast, maxPayloadLength })) {
      if (abortController.signal.aborted) {
        break;
      }
      if (!result.ok) {
        failed += 1;
        console.error(`Failed: ${path}: [${result.error.code}] ${result.error.message}`);
        continue;
      }

      analyzed += 1;
      const { summary } = result;
      byCompression.set(summary.compression, (byCompression.get(summary.compression) ?? 0) + 1);
      const json = summaryToJson(summary);
      console.log(`${path}: ${JSON.stringify(json)}`);
      if (output && outputError) {
        await Promise.race([writeJsonLine(output, json), outputError]);
      }
    }

    if (output && outputError) {
      await Promise.race([endStream(output), outputError]);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  } finally {
    for (const cleanup of cleanupHandlers) {
      cleanup();
    }
  }

  printReport(analyzed, failed, byCompression);
  if (failed > 0 || abortController.signal.aborted) {
    process.exitCode = 1;
  }
};

void run();
