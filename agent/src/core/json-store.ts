/**
 * JSON File Store
 *
 * Atomic read/write helpers for the user-editable configuration files,
 * plus the self-healing loader: a missing or malformed file is replaced by
 * the shipped default and read once more.
 */

import { promises as fs, readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { createComponentLogger } from "../logging.js";
import { ConfigError, errorMessage } from "./errors.js";

const log = createComponentLogger("json-store");

const DEFAULTS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "defaults");

// ============================================
// PRIMITIVES
// ============================================

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and parse a JSON file. A corrupt file is backed up beside itself
 * (`.corrupt_<epochMs>`) before the error is rethrown.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  try {
    return JSON.parse(stripBom(content));
  } catch (err) {
    const backupPath = `${filePath}.corrupt_${Date.now()}`;
    log.warn(`Corrupt JSON in ${filePath}, backing up to ${backupPath}`);
    await fs.copyFile(filePath, backupPath).catch((copyErr: unknown) => {
      log.error(`Could not back up ${filePath}`, copyErr);
    });
    throw new Error(`Corrupt JSON in ${filePath}: ${errorMessage(err)}`);
  }
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const json = JSON.stringify(data, null, 2);
  // rename() is atomic on the same filesystem
  const tmpPath = `${filePath}.tmp_${Date.now()}`;
  await fs.writeFile(tmpPath, json, "utf-8");
  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

// ============================================
// SHIPPED DEFAULTS
// ============================================

/**
 * Read a default shipped in `agent/defaults/`. These files are part of the
 * source tree, so a failure here is a packaging bug and throws.
 */
export function readShippedDefault(name: string): unknown {
  const filePath = path.join(DEFAULTS_DIR, name);
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

// ============================================
// SELF-HEALING LOAD
// ============================================

/**
 * Load `filePath` through `parse`. When the file is missing, unreadable or
 * rejected by `parse` (returns null), write `defaults` (the on-disk form)
 * and retry once. A second failure is a ConfigError.
 */
export async function loadOrSeed<T>(
  filePath: string,
  defaults: unknown,
  parse: (raw: unknown) => T | null,
): Promise<T> {
  const first = await tryLoad(filePath, parse);
  if (first.ok) return first.value;

  log.warn(`Config ${filePath} unusable (${first.reason}); writing default`);
  await writeJson(filePath, defaults);

  const second = await tryLoad(filePath, parse);
  if (second.ok) return second.value;
  throw new ConfigError(`Config ${filePath} still unusable after reseeding: ${second.reason}`, filePath);
}

type LoadResult<T> = { ok: true; value: T } | { ok: false; reason: string };

async function tryLoad<T>(filePath: string, parse: (raw: unknown) => T | null): Promise<LoadResult<T>> {
  let raw: unknown;
  try {
    raw = await readJson(filePath);
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
  const value = parse(raw);
  if (value === null) return { ok: false, reason: "unexpected shape" };
  return { ok: true, value };
}
