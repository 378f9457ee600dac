import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import type { AppConfig } from "@docenrich/types";
import { loadConfig } from "@docenrich/config";

/** Writable that keeps everything written to it as text. */
export function captureOutput(): { stream: Writable; text: () => string } {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

/** Loads a config file written to a fresh temp directory, ignoring the process environment. */
export function testConfig(layer: Record<string, unknown>): AppConfig {
  const dir = mkdtempSync(join(tmpdir(), "docenrich-cli-"));
  const path = join(dir, "config.json");
  writeFileSync(path, JSON.stringify(layer), "utf8");
  return loadConfig({ configPath: path, env: {} }).config;
}
