// src/file-discovery.ts — Schematic discovery
// Explicit files are taken as given; directories are walked for *.kicad_sch.

import { existsSync, readdirSync, realpathSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import picomatch from "picomatch";
import { DEFAULT_EXCLUDE_DIRS, SCHEMATIC_EXTENSION } from "./types.js";
import type { Warning } from "./types.js";

/**
 * Resolve the schematic files named by `paths` (files or directories).
 * Exclude patterns apply to paths relative to each walked directory.
 * The result is de-duplicated and sorted.
 */
export function discoverSchematics(
  paths: string[],
  excludePatterns: string[],
  warnings: Warning[] = [],
): string[] {
  const found = new Set<string>();

  for (const input of paths) {
    const absPath = resolve(input);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "file-discovery",
        message: `Path not found: ${input}`,
        file: absPath,
      });
      continue;
    }

    if (statSync(absPath).isDirectory()) {
      const files: string[] = [];
      walkDirectory(absPath, files, new Set<number>(), warnings);
      for (const f of filterExcluded(files, absPath, excludePatterns)) found.add(f);
    } else {
      found.add(absPath);
    }
  }

  return [...found].sort();
}

function isExcludedDir(name: string): boolean {
  return (DEFAULT_EXCLUDE_DIRS as readonly string[]).includes(name) || name.endsWith("-backups");
}

/**
 * Recursive walk. Symlinked directories are followed once (inode check).
 */
function walkDirectory(
  dir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!isExcludedDir(entry.name)) walkDirectory(fullPath, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const stat = statSync(realpathSync(fullPath));
        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino) || isExcludedDir(entry.name)) continue;
          visitedInodes.add(stat.ino);
          walkDirectory(fullPath, results, visitedInodes, warnings);
        } else if (stat.isFile() && SCHEMATIC_EXTENSION.test(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && SCHEMATIC_EXTENSION.test(entry.name)) {
      results.push(fullPath);
    }
  }
}

function filterExcluded(files: string[], rootDir: string, excludePatterns: string[]): string[] {
  if (excludePatterns.length === 0) return files;
  const isExcluded = picomatch(excludePatterns, { dot: true });
  return files.filter((f) => !isExcluded(relative(rootDir, f)));
}
