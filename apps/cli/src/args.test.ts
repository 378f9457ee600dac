import { describe, it, expect } from "vitest";
import { parseCliArgs, UsageError } from "./args.js";

describe("parseCliArgs", () => {
  it("parses ingest with its options", () => {
    expect(
      parseCliArgs([
        "ingest",
        "report.pdf",
        "--config",
        "cfg.json",
        "--collection",
        "docs",
        "--deadline",
        "60000",
      ]),
    ).toEqual({
      name: "ingest",
      pdfPath: "report.pdf",
      configPath: "cfg.json",
      collection: "docs",
      deadlineMs: 60000,
    });
  });

  it("parses chat and clear", () => {
    expect(parseCliArgs(["chat", "-c", "cfg.json"])).toEqual({
      name: "chat",
      configPath: "cfg.json",
      collection: undefined,
    });
    expect(parseCliArgs(["clear", "--yes"])).toEqual({
      name: "clear",
      yes: true,
      configPath: undefined,
      collection: undefined,
    });
    expect(parseCliArgs(["clear"])).toMatchObject({ name: "clear", yes: false });
  });

  it("returns help without a command", () => {
    expect(parseCliArgs([])).toEqual({ name: "help" });
    expect(parseCliArgs(["ingest", "--help"])).toEqual({ name: "help" });
  });

  it("requires the PDF path for ingest", () => {
    expect(() => parseCliArgs(["ingest"])).toThrow("ingest needs the path of a PDF file");
  });

  it("rejects a deadline that is not a positive integer", () => {
    expect(() => parseCliArgs(["ingest", "a.pdf", "--deadline", "soon"])).toThrow(
      '--deadline must be a positive integer, got "soon"',
    );
    expect(() => parseCliArgs(["ingest", "a.pdf", "--deadline", "0"])).toThrow(UsageError);
  });

  it("rejects options meant for another command", () => {
    expect(() => parseCliArgs(["chat", "--yes"])).toThrow("--yes is only accepted by clear");
    expect(() => parseCliArgs(["clear", "--deadline", "10"])).toThrow(
      "--deadline is only accepted by ingest",
    );
  });

  it("rejects unknown commands, options and extra arguments", () => {
    expect(() => parseCliArgs(["index", "a.pdf"])).toThrow("Unknown command: index");
    expect(() => parseCliArgs(["chat", "--verbose"])).toThrow(UsageError);
    expect(() => parseCliArgs(["clear", "now"])).toThrow("Unexpected argument: now");
  });
});
