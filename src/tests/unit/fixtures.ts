import type { ApplianceSpec, Household, SystemConfig } from "../../household/types.js";

export const baseSystem: SystemConfig = {
  solarPanelCapacityW: 1000,
  batteryCapacityWh: 2000,
  chargeControllerMaxW: 1000,
  inverterMaxOutputW: 1500,
  sunriseHour: 6,
  sunsetHour: 18,
  systemVoltage: 12,
};

export const appliance = (overrides: Partial<ApplianceSpec> = {}): ApplianceSpec => ({
  name: "Pump",
  powerW: 200,
  priority: 1,
  startHour: 0,
  endHour: 24,
  minRuntimeHours: 0,
  ...overrides,
});

export const household = (
  appliances: readonly ApplianceSpec[] = [],
  system: Partial<SystemConfig> = {}
): Household => ({
  system: { ...baseSystem, ...system },
  appliances,
});
