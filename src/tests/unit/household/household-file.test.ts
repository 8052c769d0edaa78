import { describe, it, expect } from "@effect/vitest";
import { Effect, Layer } from "effect";
import { FileSystem } from "@effect/platform";
import { SystemError } from "@effect/platform/Error";
import { HouseholdFile, HouseholdFileLayer } from "../../../household/household-file.js";
import { appliance, household } from "../fixtures.js";

// In-memory stand-in for the disk
const makeFileSystemLayer = (files: Map<string, string>) =>
  FileSystem.layerNoop({
    readFileString: (path) => {
      const content = files.get(path);
      return content === undefined
        ? Effect.fail(
            SystemError({
              reason: "NotFound",
              module: "FileSystem",
              method: "readFileString",
              pathOrDescriptor: path,
              message: "not found",
            })
          )
        : Effect.succeed(content);
    },
    writeFileString: (path, data) => Effect.sync(() => void files.set(path, data)),
  });

const makeLayer = (files: Map<string, string>) =>
  HouseholdFileLayer.pipe(Layer.provide(makeFileSystemLayer(files)));

const validDocument = {
  solar_panel: { name: "Solar Panel", capacity: 1000 },
  battery: { name: "Battery", capacity: 2000 },
  charge_controller: { name: "Charge Controller", capacity: 40 },
  inverter: { name: "Inverter", capacity: 1500 },
  appliances: [{ name: "Fridge", power: 150, priority: "High", start_time: "00:00", end_time: "24:00", min_runtime: 12 }],
  sunrise: "06:00",
  sunset: "20:00",
  system_voltage: 12,
};

describe("HouseholdFile", () => {
  it.effect("should load and validate a household document", () => {
    const files = new Map([["household.json", JSON.stringify(validDocument)]]);

    return Effect.gen(function* () {
      const householdFile = yield* HouseholdFile;
      const result = yield* householdFile.load("household.json");

      expect(result.system.chargeControllerMaxW).toBe(480);
      expect(result.appliances).toEqual([
        { name: "Fridge", powerW: 150, priority: 1, startHour: 0, endHour: 24, minRuntimeHours: 12 },
      ]);
    }).pipe(Effect.provide(makeLayer(files)));
  });

  it.effect("should fail with HouseholdFileError when the file cannot be read", () =>
    Effect.gen(function* () {
      const householdFile = yield* HouseholdFile;
      const error = yield* Effect.flip(householdFile.load("missing.json"));

      expect(error._tag).toBe("HouseholdFileError");
      if (error._tag === "HouseholdFileError") {
        expect(error.path).toBe("missing.json");
        expect(error.cause._tag).toBe("SystemError");
      }
    }).pipe(Effect.provide(makeLayer(new Map())))
  );

  it.effect("should fail with ConfigurationError when the document is invalid", () => {
    const files = new Map([
      ["household.json", JSON.stringify({ ...validDocument, sunrise: "21:00", sunset: "06:00" })],
    ]);

    return Effect.gen(function* () {
      const householdFile = yield* HouseholdFile;
      const error = yield* Effect.flip(householdFile.load("household.json"));

      expect(error._tag).toBe("ConfigurationError");
      expect(error.message).toBe("system.sunriseHour: sunrise (21) must be before sunset (6)");
    }).pipe(Effect.provide(makeLayer(files)));
  });

  it.effect("should save a household that loads back unchanged", () => {
    const files = new Map<string, string>();
    const original = household(
      [appliance({ name: "Pump", powerW: 400, priority: 2, startHour: 9, endHour: 16, minRuntimeHours: 3 })],
      { chargeControllerMaxW: 480, sunsetHour: 20 }
    );

    return Effect.gen(function* () {
      const householdFile = yield* HouseholdFile;

      yield* householdFile.save("saved.json", original);

      expect(files.has("saved.json")).toBe(true);
      expect(yield* householdFile.load("saved.json")).toEqual(original);
    }).pipe(Effect.provide(makeLayer(files)));
  });
});
