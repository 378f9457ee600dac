import { loadConfig } from "@docenrich/config";
import { createChildLogger, createLogger } from "@docenrich/logger";
import { toAppError } from "@docenrich/errors";
import { parseCliArgs, USAGE, UsageError, type CliCommand } from "./args.js";
import { answerDependencies, createContainer } from "./container.js";
import { processIngest } from "./commands/ingest.js";
import { processChat } from "./commands/chat.js";
import { processClear } from "./commands/clear.js";

async function run(command: Exclude<CliCommand, { name: "help" }>): Promise<number> {
  const { config, configFile } = loadConfig({ configPath: command.configPath });
  const root = createLogger({
    level: config.logLevel,
    service: "docenrich",
    pretty: config.nodeEnv === "development",
    fd: 2,
  });
  const logger = createChildLogger(root, { command: command.name });
  logger.debug({ configFile }, "Configuration loaded");

  const container = createContainer(config, logger);

  switch (command.name) {
    case "ingest":
      return processIngest(command, container, process.stdout);
    case "chat":
      await processChat(answerDependencies(container, command.collection), {
        input: process.stdin,
        output: process.stdout,
      });
      return 0;
    case "clear":
      await processClear(command, container, { input: process.stdin, output: process.stdout });
      return 0;
  }
}

async function main(argv: readonly string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  if (command.name === "help") {
    process.stdout.write(USAGE);
    return 0;
  }
  return run(command);
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const error = toAppError(err);
    console.error(`[docenrich] ${error.code}: ${error.message}`);
    process.exitCode = 1;
  },
);
