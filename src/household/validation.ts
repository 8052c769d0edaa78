import { Effect } from "effect";
import { ConfigurationError, type ConfigurationIssue } from "../errors/configuration.error.js";
import type { ApplianceSpec, Household, SystemConfig } from "./types.js";

const issue = (path: string, message: string): ConfigurationIssue => ({ path, message });

const mustBePositive = (path: string, value: number): ConfigurationIssue[] =>
  Number.isFinite(value) && value > 0 ? [] : [issue(path, `must be a positive number, got ${value}`)];

const isHourOfDay = (value: number): boolean => Number.isInteger(value) && value >= 0 && value <= 24;

export const systemConfigIssues = (system: SystemConfig): ConfigurationIssue[] => {
  const issues = [
    ...mustBePositive("system.solarPanelCapacityW", system.solarPanelCapacityW),
    ...mustBePositive("system.batteryCapacityWh", system.batteryCapacityWh),
    ...mustBePositive("system.chargeControllerMaxW", system.chargeControllerMaxW),
    ...mustBePositive("system.inverterMaxOutputW", system.inverterMaxOutputW),
    ...mustBePositive("system.systemVoltage", system.systemVoltage),
  ];

  if (!(system.sunriseHour >= 0 && system.sunriseHour <= 24)) {
    issues.push(issue("system.sunriseHour", `must be within 0-24, got ${system.sunriseHour}`));
  }

  if (!(system.sunsetHour >= 0 && system.sunsetHour <= 24)) {
    issues.push(issue("system.sunsetHour", `must be within 0-24, got ${system.sunsetHour}`));
  }

  if (!(system.sunriseHour < system.sunsetHour)) {
    issues.push(
      issue("system.sunriseHour", `sunrise (${system.sunriseHour}) must be before sunset (${system.sunsetHour})`)
    );
  }

  return issues;
};

const applianceSpecIssues = (appliance: ApplianceSpec, path: string): ConfigurationIssue[] => {
  const issues: ConfigurationIssue[] = [];

  if (appliance.name.trim() === "") {
    issues.push(issue(`${path}.name`, "must not be empty"));
  }

  if (!(Number.isFinite(appliance.powerW) && appliance.powerW >= 0)) {
    issues.push(issue(`${path}.powerW`, `must be zero or more, got ${appliance.powerW}`));
  }

  if (!Number.isInteger(appliance.priority)) {
    issues.push(issue(`${path}.priority`, `must be an integer, got ${appliance.priority}`));
  }

  if (!isHourOfDay(appliance.startHour)) {
    issues.push(issue(`${path}.startHour`, `must be a whole hour within 0-24, got ${appliance.startHour}`));
  }

  if (!isHourOfDay(appliance.endHour)) {
    issues.push(issue(`${path}.endHour`, `must be a whole hour within 0-24, got ${appliance.endHour}`));
  }

  if (appliance.startHour > appliance.endHour) {
    issues.push(
      issue(`${path}.startHour`, `start (${appliance.startHour}) must not be after end (${appliance.endHour})`)
    );
  }

  const windowHours = Math.max(0, appliance.endHour - appliance.startHour);

  if (!(Number.isFinite(appliance.minRuntimeHours) && appliance.minRuntimeHours >= 0)) {
    issues.push(issue(`${path}.minRuntimeHours`, `must be zero or more, got ${appliance.minRuntimeHours}`));
  } else if (appliance.minRuntimeHours > windowHours) {
    issues.push(
      issue(
        `${path}.minRuntimeHours`,
        `${appliance.minRuntimeHours}h does not fit the ${windowHours}h window`
      )
    );
  }

  return issues;
};

export const applianceIssues = (appliances: readonly ApplianceSpec[]): ConfigurationIssue[] => {
  const seen = new Set<string>();

  return appliances.flatMap((appliance, index) => {
    const path = `appliances[${index}]`;
    const issues = applianceSpecIssues(appliance, path);

    if (seen.has(appliance.name)) {
      issues.push(issue(`${path}.name`, `duplicate appliance name "${appliance.name}"`));
    }
    seen.add(appliance.name);

    return issues;
  });
};

export const householdIssues = (household: Household): ConfigurationIssue[] => [
  ...systemConfigIssues(household.system),
  ...applianceIssues(household.appliances),
];

export const validateHousehold = (household: Household): Effect.Effect<Household, ConfigurationError> => {
  const issues = householdIssues(household);

  return issues.length === 0
    ? Effect.succeed(household)
    : Effect.fail(ConfigurationError.fromIssues(issues));
};

export const validateDays = (numDays: number): Effect.Effect<number, ConfigurationError> =>
  Number.isInteger(numDays) && numDays > 0
    ? Effect.succeed(numDays)
    : Effect.fail(
        ConfigurationError.fromIssues([issue("numDays", `must be a positive whole number, got ${numDays}`)])
      );
