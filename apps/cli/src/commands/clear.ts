import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import type { Container } from "../container.js";

export interface ClearCommand {
  yes: boolean;
  collection?: string;
}

export interface ClearIO {
  input: Readable;
  output: Writable;
}

async function confirm(question: string, io: ClearIO): Promise<boolean> {
  const rl = createInterface({ input: io.input, output: io.output, terminal: false });
  try {
    const reply = await rl.question(question);
    return ["y", "yes"].includes(reply.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

/**
 * Drop the collection and recreate it empty with the configured dimensions.
 * Returns false when the user declines.
 */
export async function processClear(
  command: ClearCommand,
  container: Container,
  io: ClearIO,
): Promise<boolean> {
  const { config, vectorStore, logger } = container;
  const collectionName = command.collection ?? config.vectorStore.collectionName;

  if (!command.yes) {
    const confirmed = await confirm(
      `Delete every point in collection "${collectionName}"? [y/N] `,
      io,
    );
    if (!confirmed) {
      io.output.write("Aborted.\n");
      return false;
    }
  }

  await vectorStore.deleteCollection(collectionName);
  await vectorStore.ensureCollection(collectionName, config.embedding.dimensions);
  logger.info({ collectionName, dimensions: config.embedding.dimensions }, "Collection cleared");
  io.output.write(`Collection "${collectionName}" cleared.\n`);
  return true;
}
