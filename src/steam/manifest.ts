import fsp from "fs/promises";
import path from "path";
import { Effect, Layer, Option } from "effect";
import type { SubjectKey } from "../monitor/types.js";
import { NameResolver } from "../report/nameResolver.js";

const NAME_RE = /"\s*name\s*"\s*"([^"]+)"/i;

export function parseManifestName(text: string): string | undefined {
  const match = NAME_RE.exec(text);
  const name = match?.[1]?.trim();
  return name ? name : undefined;
}

export function manifestFileName(appId: SubjectKey): string {
  return `appmanifest_${appId}.acf`;
}

/** Name from the first library whose appmanifest_<id>.acf carries one */
export async function findManifestName(
  libraries: ReadonlyArray<string>,
  appId: SubjectKey
): Promise<string | undefined> {
  const fileName = manifestFileName(appId);
  for (const library of libraries) {
    let text: string;
    try {
      text = await fsp.readFile(path.join(library, "steamapps", fileName), "utf8");
    } catch {
      continue;
    }
    const name = parseManifestName(text);
    if (name) return name;
  }
  return undefined;
}

export const makeManifestNameResolver = (libraries: ReadonlyArray<string>) => {
  const cache = new Map<SubjectKey, string>();
  return NameResolver.of({
    resolve: (subject) => {
      const cached = cache.get(subject);
      if (cached !== undefined) return Effect.succeed(Option.some(cached));
      return Effect.promise(() => findManifestName(libraries, subject)).pipe(
        Effect.map((name) => {
          if (name !== undefined) cache.set(subject, name);
          return Option.fromNullable(name);
        })
      );
    },
  });
};

export const ManifestNameResolverLive = (libraries: ReadonlyArray<string>) =>
  Layer.sync(NameResolver, () => makeManifestNameResolver(libraries));
