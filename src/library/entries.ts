// ─── Directory Entries ──────────────────────────────────────────────────────
//
// `Dirent.isDirectory()` and `isFile()` describe a symlink itself, not what
// it points at. Libraries on shared drives link set folders and recordings
// in, so a link is classified by its target. A dangling link is neither.
// ─────────────────────────────────────────────────────────────────────────────

import { statSync } from "node:fs";
import { join } from "node:path";

/** The parts of `fs.Dirent` used here. */
export interface DirEntry {
  name: string;
  isDirectory(): boolean;
  isFile(): boolean;
  isSymbolicLink(): boolean;
}

function target(dir: string, entry: DirEntry) {
  return statSync(join(dir, entry.name), { throwIfNoEntry: false });
}

export function isDirectoryEntry(dir: string, entry: DirEntry): boolean {
  if (entry.isSymbolicLink()) return target(dir, entry)?.isDirectory() ?? false;
  return entry.isDirectory();
}

export function isFileEntry(dir: string, entry: DirEntry): boolean {
  if (entry.isSymbolicLink()) return target(dir, entry)?.isFile() ?? false;
  return entry.isFile();
}
