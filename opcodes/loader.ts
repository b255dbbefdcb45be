// Loads extension declarations from a directory of modules.

import { existsSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import type { ExtensionSource, RejectedExtension } from "./registry";
import type { ExtensionDefinition } from "./types";

export interface DirectoryLoadResult {
  entries: ExtensionSource[];
  rejected: RejectedExtension[];
}

const MODULE_FILE = /\.(js|cjs|ts)$/;
const SKIPPED_FILE = /(\.d\.ts|\.test\.[cm]?[jt]s|\.spec\.[cm]?[jt]s)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isExtensionDefinition(
  value: unknown,
): value is ExtensionDefinition {
  return (
    isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.code === "number" &&
    typeof value.operandBearing === "boolean" &&
    typeof value.execute === "function" &&
    (value.cost === undefined || typeof value.cost === "number")
  );
}

/**
 * Finds the declaration a module exports: its default export, the module
 * object itself, or the first named export shaped like a declaration.
 */
export function findDefinition(mod: unknown): ExtensionDefinition | null {
  if (!isRecord(mod)) return null;
  const fallback = mod.default;
  if (isExtensionDefinition(fallback)) return fallback;
  if (isExtensionDefinition(mod)) return mod;
  for (const value of Object.values(mod)) {
    if (isExtensionDefinition(value)) return value;
  }
  return null;
}

export function listExtensionFiles(dir: string): string[] {
  return readdirSync(dir)
    .filter(
      (file) =>
        MODULE_FILE.test(file) &&
        !SKIPPED_FILE.test(file) &&
        !file.startsWith("_") &&
        statSync(join(dir, file)).isFile(),
    )
    .sort();
}

/**
 * Enumerates extension modules in file-name order. Modules that fail to
 * load or export no declaration are reported, not thrown.
 */
export function loadExtensionDirectory(dir: string): DirectoryLoadResult {
  const result: DirectoryLoadResult = { entries: [], rejected: [] };
  const root = resolve(dir);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    return result;
  }

  for (const file of listExtensionFiles(root)) {
    const source = join(root, file);
    let mod: unknown;
    try {
      mod = require(source);
    } catch (err) {
      const reason = `failed to load: ${err instanceof Error ? err.message : String(err)}`;
      console.warn(`Warning: extension ${source} ${reason}`);
      result.rejected.push({ name: file, source, reason });
      continue;
    }

    const definition = findDefinition(mod);
    if (!definition) {
      const reason = "exports no extension declaration";
      console.warn(`Warning: extension ${source} ${reason}`);
      result.rejected.push({ name: file, source, reason });
      continue;
    }
    result.entries.push({ definition, source });
  }
  return result;
}
