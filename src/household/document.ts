import { Effect, ParseResult, Schema } from "effect";
import { ConfigurationError, type ConfigurationIssue } from "../errors/configuration.error.js";
import {
  HouseholdDocumentJson,
  HouseholdDocumentSchema,
  type HouseholdDocument,
} from "./schema.js";
import type { Household } from "./types.js";

const COMPONENT_NAMES = {
  solarPanel: "Solar Panel",
  battery: "Battery",
  chargeController: "Charge Controller",
  inverter: "Inverter",
} as const;

const formatPath = (path: ReadonlyArray<PropertyKey>): string =>
  path.reduce<string>(
    (acc, key) => (typeof key === "number" ? `${acc}[${key}]` : `${acc}.${String(key)}`),
    "document"
  );

const toConfigurationError = (error: ParseResult.ParseError): ConfigurationError =>
  ConfigurationError.fromIssues(
    ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }))
  );

const fromDocument = (document: HouseholdDocument): Effect.Effect<Household, ConfigurationError> => {
  const { solar_panel, battery, charge_controller, inverter } = document;

  if (!solar_panel || !battery || !charge_controller || !inverter) {
    const missing: ConfigurationIssue[] = Object.entries({ solar_panel, battery, charge_controller, inverter })
      .filter(([, component]) => component === null)
      .map(([key]) => ({ path: `document.${key}`, message: "component has not been set" }));

    return Effect.fail(ConfigurationError.fromIssues(missing));
  }

  return Effect.succeed({
    system: {
      solarPanelCapacityW: solar_panel.capacity,
      batteryCapacityWh: battery.capacity,
      chargeControllerMaxW: charge_controller.capacity * document.system_voltage,
      inverterMaxOutputW: inverter.capacity,
      sunriseHour: document.sunrise,
      sunsetHour: document.sunset,
      systemVoltage: document.system_voltage,
    },
    appliances: document.appliances.map((appliance) => ({
      name: appliance.name,
      powerW: appliance.power,
      priority: appliance.priority,
      // Windows are whole hours; minutes are dropped
      startHour: Math.floor(appliance.start_time),
      endHour: Math.floor(appliance.end_time),
      minRuntimeHours: appliance.min_runtime,
    })),
  });
};

export const toDocument = (household: Household): HouseholdDocument => {
  const { system } = household;

  return {
    solar_panel: { name: COMPONENT_NAMES.solarPanel, capacity: system.solarPanelCapacityW },
    battery: { name: COMPONENT_NAMES.battery, capacity: system.batteryCapacityWh },
    charge_controller: {
      name: COMPONENT_NAMES.chargeController,
      capacity: system.chargeControllerMaxW / system.systemVoltage,
    },
    inverter: { name: COMPONENT_NAMES.inverter, capacity: system.inverterMaxOutputW },
    appliances: household.appliances.map((appliance) => ({
      name: appliance.name,
      power: appliance.powerW,
      priority: appliance.priority,
      start_time: appliance.startHour,
      end_time: appliance.endHour,
      min_runtime: appliance.minRuntimeHours,
    })),
    sunrise: system.sunriseHour,
    sunset: system.sunsetHour,
    system_voltage: system.systemVoltage,
  };
};

/** Decodes an already parsed document, e.g. one produced by a form or JSON.parse. */
export const decodeHouseholdDocument = (input: unknown): Effect.Effect<Household, ConfigurationError> =>
  Schema.decodeUnknown(HouseholdDocumentSchema)(input).pipe(
    Effect.mapError(toConfigurationError),
    Effect.flatMap(fromDocument)
  );

export const parseHouseholdJson = (content: string): Effect.Effect<Household, ConfigurationError> =>
  Schema.decodeUnknown(HouseholdDocumentJson)(content).pipe(
    Effect.mapError(toConfigurationError),
    Effect.flatMap(fromDocument)
  );

export const encodeHouseholdJson = (household: Household): Effect.Effect<string, ParseResult.ParseError> =>
  Schema.encode(HouseholdDocumentJson)(toDocument(household));
