import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import type { Writable } from "node:stream";
import type { DocumentSource, ExitCode } from "@docenrich/types";
import { AppError } from "@docenrich/errors";
import { runPipeline } from "@docenrich/core";
import { pipelineDependencies, type Container } from "../container.js";

export interface IngestCommand {
  pdfPath: string;
  collection?: string;
  deadlineMs?: number;
}

export async function readSource(pdfPath: string): Promise<DocumentSource> {
  const path = resolve(pdfPath);
  try {
    const bytes = await readFile(path);
    return { path, fileName: basename(path), bytes };
  } catch (err) {
    throw new AppError({
      message: `Cannot read ${path}`,
      statusCode: 400,
      code: "SOURCE_UNREADABLE",
      details: { path },
      cause: err,
    });
  }
}

/**
 * Run one PDF through the pipeline and print the run summary as JSON.
 * The summary's exit code becomes the process exit code.
 */
export async function processIngest(
  command: IngestCommand,
  container: Container,
  out: Writable,
): Promise<ExitCode> {
  const source = await readSource(command.pdfPath);
  const summary = await runPipeline(
    source,
    pipelineDependencies(container, {
      collectionName: command.collection,
      deadlineMs: command.deadlineMs,
    }),
  );

  out.write(`${JSON.stringify(summary, null, 2)}\n`);
  return summary.exitCode;
}
