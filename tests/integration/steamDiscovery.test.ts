import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Effect, Option } from "effect";
import {
  contentLogPath,
  defaultSteamRootCandidates,
  listLibraryPaths,
  parseLibraryFolders,
  parseRegQueryValue,
} from "../../src/steam/discovery.ts";
import {
  findManifestName,
  makeManifestNameResolver,
  parseManifestName,
} from "../../src/steam/manifest.ts";

const manifest = (appId: string, name: string) =>
  `"AppState"\n{\n\t"appid"\t\t"${appId}"\n\t"name"\t\t"${name}"\n\t"StateFlags"\t\t"4"\n}\n`;

test("parseRegQueryValue reads the value column of reg query output", () => {
  const stdout =
    "\r\nHKEY_CURRENT_USER\\Software\\Valve\\Steam\r\n" +
    "    SteamPath    REG_SZ    c:/program files (x86)/steam\r\n\r\n";
  assert.equal(parseRegQueryValue(stdout, "SteamPath"), "c:/program files (x86)/steam");
  assert.equal(parseRegQueryValue(stdout, "InstallPath"), undefined);
});

test("default roots follow the platform layout", () => {
  assert.deepEqual(defaultSteamRootCandidates("darwin", "/Users/tester"), [
    "/Users/tester/Library/Application Support/Steam",
  ]);
  assert.deepEqual(defaultSteamRootCandidates("linux", "/home/tester"), [
    "/home/tester/.steam/steam",
    "/home/tester/.local/share/Steam",
  ]);
  assert.equal(contentLogPath("/opt/steam"), "/opt/steam/logs/content_log.txt");
});

test("parseLibraryFolders reads current and legacy layouts", () => {
  const current = [
    '"libraryfolders"',
    "{",
    '\t"0"',
    "\t{",
    '\t\t"path"\t\t"/home/tester/.steam/steam"',
    '\t\t"label"\t\t""',
    "\t}",
    '\t"1"',
    "\t{",
    '\t\t"path"\t\t"/mnt/games/SteamLibrary"',
    "\t}",
    "}",
  ].join("\n");
  assert.deepEqual(parseLibraryFolders(current), [
    "/home/tester/.steam/steam",
    "/mnt/games/SteamLibrary",
  ]);

  const legacy = '"LibraryFolders"\n{\n\t"1"\t\t"/mnt/old"\n}\n';
  assert.deepEqual(parseLibraryFolders(legacy), ["/mnt/old"]);
});

test("parseLibraryFolders collapses escaped backslashes", () => {
  assert.deepEqual(parseLibraryFolders('"path"\t\t"D:\\\\Games"'), ["D:\\Games"]);
});

test("parseManifestName reads the name key case-insensitively", () => {
  assert.equal(parseManifestName(manifest("10", "Game X")), "Game X");
  assert.equal(parseManifestName('"AppState"\n{\n\t"NAME"\t\t"Other"\n}'), "Other");
  assert.equal(parseManifestName('"AppState"\n{\n\t"appid"\t\t"10"\n}'), undefined);
});

test("libraries and manifest names are discovered on disk", async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "steamwatch-root-"));
  const extra = await fs.mkdtemp(path.join(os.tmpdir(), "steamwatch-lib-"));
  const missing = path.join(extra, "not-there");
  await fs.mkdir(path.join(root, "steamapps"));
  await fs.mkdir(path.join(extra, "steamapps"));
  await fs.writeFile(
    path.join(root, "steamapps", "libraryfolders.vdf"),
    `"libraryfolders"\n{\n\t"0"\n\t{\n\t\t"path"\t\t"${root}"\n\t}\n\t"1"\n\t{\n\t\t"path"\t\t"${extra}"\n\t}\n\t"2"\n\t{\n\t\t"path"\t\t"${missing}"\n\t}\n}\n`
  );
  await fs.writeFile(path.join(extra, "steamapps", "appmanifest_10.acf"), manifest("10", "Game X"));

  const libraries = await listLibraryPaths(root);
  assert.deepEqual(libraries, [root, extra]);
  assert.equal(await findManifestName(libraries, "10"), "Game X");
  assert.equal(await findManifestName(libraries, "20"), undefined);

  const resolver = makeManifestNameResolver(libraries);
  const first = await Effect.runPromise(resolver.resolve("10"));
  await fs.rm(path.join(extra, "steamapps", "appmanifest_10.acf"));
  const cached = await Effect.runPromise(resolver.resolve("10"));
  const unknown = await Effect.runPromise(resolver.resolve("20"));
  assert.equal(Option.getOrUndefined(first), "Game X");
  assert.equal(Option.getOrUndefined(cached), "Game X");
  assert.ok(Option.isNone(unknown));
});

test("a root without libraryfolders.vdf lists only itself", async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "steamwatch-root-"));
  await fs.mkdir(path.join(root, "steamapps"));
  assert.deepEqual(await listLibraryPaths(root), [root]);
});
