import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { EntryPointHint } from "@plugscan/discovery";
import { DEFAULT_ENTRY_POINT_GROUP } from "./constants.js";

export interface EntryPoint {
  readonly group: string;
  readonly name: string;
  readonly module: string;
  /** Absent for module-only entry points */
  readonly attribute?: string | undefined;
}

const SECTION = /^\[\s*([^\]]+?)\s*\]$/;
const ENTRY = /^([^=]+?)\s*=\s*([A-Za-z_][\w.]*)\s*(?::\s*([A-Za-z_][\w.]*))?\s*(?:\[[^\]]*\])?$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the entries of one group out of an `entry_points.txt` file.
 * Lines that are not `name = module[:attr]` are skipped.
 */
export function parseEntryPoints(text: string, group: string = DEFAULT_ENTRY_POINT_GROUP): EntryPoint[] {
  const entries: EntryPoint[] = [];
  let current: string | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#") || line.startsWith(";")) continue;

    const section = SECTION.exec(line);
    if (section) {
      current = section[1];
      continue;
    }
    if (current !== group) continue;

    const entry = ENTRY.exec(line);
    if (!entry) continue;
    const [, name, module, attribute] = entry;
    if (name === undefined || module === undefined) continue;
    entries.push({ group, name: name.trim(), module, attribute });
  }

  return entries;
}

/** Wheel-style distribution name: runs of `-`, `_`, `.` become `_`, lowercased. */
export function normalizeDistributionName(packageName: string): string {
  return packageName.trim().replace(/[-_.]+/g, "_").toLowerCase();
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/**
 * Find the first `module:attribute` entry point of `packageName` under a
 * site-packages directory. Resolves to `undefined` when the directory,
 * the `.dist-info` or a matching entry is missing.
 */
export async function readEntryPointHint(
  siteDir: string,
  packageName: string,
  group: string = DEFAULT_ENTRY_POINT_GROUP,
): Promise<EntryPointHint | undefined> {
  let names: string[];
  try {
    names = await readdir(siteDir);
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }

  const prefix = `${normalizeDistributionName(packageName)}-`;
  const distInfos = names
    .filter((name) => name.endsWith(".dist-info") && name.toLowerCase().startsWith(prefix))
    .sort();

  for (const distInfo of distInfos) {
    let text: string;
    try {
      text = await readFile(join(siteDir, distInfo, "entry_points.txt"), "utf8");
    } catch (error) {
      if (isMissing(error)) continue;
      throw error;
    }

    const entry = parseEntryPoints(text, group).find((e) => e.attribute !== undefined);
    if (entry?.attribute !== undefined) {
      return { module: entry.module, attribute: entry.attribute };
    }
  }

  return undefined;
}

function isMissing(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
