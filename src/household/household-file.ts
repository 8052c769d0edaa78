import { FileSystem } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import type { ConfigurationError } from "../errors/configuration.error.js";
import { HouseholdFileError } from "../errors/household-file.error.js";
import { encodeHouseholdJson, parseHouseholdJson } from "./document.js";
import type { Household } from "./types.js";
import { validateHousehold } from "./validation.js";

export class HouseholdFile extends Context.Tag("HouseholdFile")<
  HouseholdFile,
  {
    readonly load: (path: string) => Effect.Effect<Household, HouseholdFileError | ConfigurationError>;
    readonly save: (path: string, household: Household) => Effect.Effect<void, HouseholdFileError>;
  }
>() {}

export const HouseholdFileLayer: Layer.Layer<HouseholdFile, never, FileSystem.FileSystem> = Layer.effect(
  HouseholdFile,
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;

    const load = (path: string) =>
      Effect.gen(function* () {
        const content = yield* fileSystem.readFileString(path).pipe(
          Effect.mapError(
            (cause) =>
              new HouseholdFileError({ path, message: `Failed to read household file: ${cause.message}`, cause })
          )
        );

        const household = yield* parseHouseholdJson(content);

        yield* Effect.logDebug(`Loaded household from ${path}`, {
          appliances: household.appliances.length,
        });

        return yield* validateHousehold(household);
      }).pipe(Effect.withSpan("HouseholdFile.load"));

    const save = (path: string, household: Household) =>
      Effect.gen(function* () {
        const content = yield* encodeHouseholdJson(household).pipe(
          Effect.mapError(
            (cause) =>
              new HouseholdFileError({ path, message: `Failed to encode household: ${cause.message}`, cause })
          )
        );

        yield* fileSystem.writeFileString(path, content).pipe(
          Effect.mapError(
            (cause) =>
              new HouseholdFileError({ path, message: `Failed to write household file: ${cause.message}`, cause })
          )
        );
      }).pipe(Effect.withSpan("HouseholdFile.save"));

    return HouseholdFile.of({ load, save });
  })
);
