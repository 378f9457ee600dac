import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { toAppError } from "@docenrich/errors";
import { answer, type AnswerDependencies } from "@docenrich/core";

const EXIT_WORDS = new Set(["exit", "quit"]);

export interface ChatIO {
  input: Readable;
  output: Writable;
}

/**
 * Interactive question loop. Each line is answered from the collection; a
 * failed turn is reported and the loop continues. Ends on `exit`, `quit` or EOF.
 */
export async function processChat(deps: AnswerDependencies, io: ChatIO): Promise<void> {
  const rl = createInterface({ input: io.input, output: io.output, terminal: false });
  const log = deps.logger.child({ command: "chat" });

  io.output.write(`Ask about the documents in "${deps.collectionName}". Type "exit" to quit.\n`);
  io.output.write("> ");

  try {
    for await (const line of rl) {
      const question = line.trim();
      if (EXIT_WORDS.has(question.toLowerCase())) break;

      if (question !== "") {
        try {
          const result = await answer(question, deps);
          io.output.write(`${result.answer}\n`);
          for (const source of result.sources) {
            io.output.write(`  [${source.score.toFixed(3)}] ${source.documentId} ${source.chunkId}\n`);
          }
        } catch (err) {
          const error = toAppError(err);
          log.error({ err: error, code: error.code }, "Question failed");
          io.output.write(`Error: ${error.message}\n`);
        }
      }
      io.output.write("> ");
    }
  } finally {
    rl.close();
  }
}
