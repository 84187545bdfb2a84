import { execFile } from "child_process";
import fs from "fs";
import fsp from "fs/promises";
import os from "os";
import path from "path";
import { promisify } from "util";

const execFileAsync = promisify(execFile);
const REG_QUERY_TIMEOUT_MS = 3000;

// Registry locations the Steam client writes its install path to.
const REGISTRY_TRIES: ReadonlyArray<{ key: string; value: string }> = [
  { key: "HKCU\\Software\\Valve\\Steam", value: "SteamPath" },
  { key: "HKCU\\Software\\Valve\\Steam", value: "InstallPath" },
  { key: "HKLM\\Software\\WOW6432Node\\Valve\\Steam", value: "InstallPath" },
  { key: "HKLM\\Software\\Valve\\Steam", value: "InstallPath" },
];

const LIBRARY_PATH_RE = /"\s*path\s*"\s*"([^"]+)"/gi;
const LEGACY_LIBRARY_RE = /"\s*\d+\s*"\s*"([^"]+)"/g;

export function parseRegQueryValue(stdout: string, valueName: string): string | undefined {
  const re = new RegExp(`^\\s*${valueName}\\s+REG_\\w+\\s+(.*?)\\s*$`, "im");
  const match = re.exec(stdout);
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

async function queryRegistry(key: string, value: string): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync("reg", ["query", key, "/v", value], {
      timeout: REG_QUERY_TIMEOUT_MS,
      windowsHide: true,
    });
    return parseRegQueryValue(stdout, value);
  } catch {
    return undefined;
  }
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export function defaultSteamRootCandidates(
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): string[] {
  if (platform === "darwin") {
    return [path.join(home, "Library", "Application Support", "Steam")];
  }
  return [path.join(home, ".steam", "steam"), path.join(home, ".local", "share", "Steam")];
}

/** Locate the Steam installation: registry on Windows, well-known folders elsewhere */
export async function findSteamRoot(
  platform: NodeJS.Platform = process.platform
): Promise<string | undefined> {
  if (platform === "win32") {
    for (const { key, value } of REGISTRY_TRIES) {
      const found = await queryRegistry(key, value);
      if (found) return found;
    }
    return undefined;
  }
  return defaultSteamRootCandidates(platform).find(isDirectory);
}

export function contentLogPath(steamRoot: string): string {
  return path.join(steamRoot, "logs", "content_log.txt");
}

function normalizeLibraryPath(raw: string): string {
  return path.normalize(raw.replace(/\\\\/g, "\\").trim().replace(/^"|"$/g, ""));
}

/** Library folder paths listed in libraryfolders.vdf, in file order */
export function parseLibraryFolders(text: string): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(LIBRARY_PATH_RE)) {
    found.push(normalizeLibraryPath(match[1]));
  }
  for (const match of text.matchAll(LEGACY_LIBRARY_RE)) {
    found.push(normalizeLibraryPath(match[1]));
  }
  return found;
}

/**
 * Every library holding a steamapps/ folder: the root first, then the
 * entries of libraryfolders.vdf, without duplicates.
 */
export async function listLibraryPaths(steamRoot: string): Promise<string[]> {
  const libraries: string[] = [];
  if (isDirectory(path.join(steamRoot, "steamapps"))) {
    libraries.push(steamRoot);
  }
  const vdfPath = path.join(steamRoot, "steamapps", "libraryfolders.vdf");
  let text: string;
  try {
    text = await fsp.readFile(vdfPath, "utf8");
  } catch {
    return libraries;
  }
  for (const library of parseLibraryFolders(text)) {
    if (isDirectory(path.join(library, "steamapps"))) {
      libraries.push(library);
    }
  }
  return [...new Set(libraries)];
}
