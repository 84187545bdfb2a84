import { Context, Effect, Layer, Option } from "effect";
import type { SubjectKey } from "../monitor/types.js";

/** Maps a subject key to a display name; no side effects are assumed */
export class NameResolver extends Context.Tag("NameResolver")<
  NameResolver,
  {
    readonly resolve: (subject: SubjectKey) => Effect.Effect<Option.Option<string>>;
  }
>() {}

/** Resolver backed by a fixed table */
export const NameResolverFromMap = (names: Readonly<Record<SubjectKey, string>>) =>
  Layer.succeed(
    NameResolver,
    NameResolver.of({
      resolve: (subject) =>
        Effect.succeed(
          Object.prototype.hasOwnProperty.call(names, subject)
            ? Option.some(names[subject])
            : Option.none()
        ),
    })
  );
