import { parseArgs } from "node:util";
import { AppError } from "@docenrich/errors";

export const USAGE = `Usage:
  docenrich ingest <pdf> [--config path] [--collection name] [--deadline ms]
  docenrich chat [--config path] [--collection name]
  docenrich clear [--config path] [--collection name] [--yes]
`;

export class UsageError extends AppError {
  constructor(message: string) {
    super({ message, statusCode: 400, code: "USAGE" });
  }
}

interface CommonOptions {
  configPath?: string;
  collection?: string;
}

export type CliCommand =
  | ({ name: "ingest"; pdfPath: string; deadlineMs?: number } & CommonOptions)
  | ({ name: "chat" } & CommonOptions)
  | ({ name: "clear"; yes: boolean } & CommonOptions)
  | { name: "help" };

const OPTIONS = {
  config: { type: "string", short: "c" },
  collection: { type: "string" },
  deadline: { type: "string" },
  yes: { type: "boolean", short: "y" },
  help: { type: "boolean", short: "h" },
} as const;

function parseDeadline(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`--deadline must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseRaw(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Turn `process.argv.slice(2)` into a command. Misuse throws {@link UsageError}. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseRaw(argv);
  const [name, ...rest] = positionals;
  if (values.help || name === undefined || name === "help") return { name: "help" };

  const common: CommonOptions = { configPath: values.config, collection: values.collection };

  if (name !== "ingest" && values.deadline !== undefined) {
    throw new UsageError("--deadline is only accepted by ingest");
  }
  if (name !== "clear" && values.yes) {
    throw new UsageError("--yes is only accepted by clear");
  }

  switch (name) {
    case "ingest": {
      const [pdfPath, ...extra] = rest;
      if (pdfPath === undefined) throw new UsageError("ingest needs the path of a PDF file");
      if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra.join(" ")}`);
      return {
        name,
        pdfPath,
        deadlineMs: values.deadline === undefined ? undefined : parseDeadline(values.deadline),
        ...common,
      };
    }
    case "chat":
    case "clear":
      if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest.join(" ")}`);
      return name === "chat" ? { name, ...common } : { name, yes: values.yes ?? false, ...common };
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
