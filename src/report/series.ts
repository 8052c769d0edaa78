import { hourlyRecords } from "../simulation/simulation-clock.js";
import type { SimulationRun } from "../simulation/types.js";

export type EnergySeries = {
  readonly generationW: readonly number[];
  readonly consumptionW: readonly number[];
  readonly batteryLevelWh: readonly number[];
};

export type ApplianceStatusSeries = {
  readonly name: string;
  readonly running: readonly (0 | 1)[];
};

// One entry per simulated hour, ready for plotting
export const energySeries = (run: SimulationRun): EnergySeries => {
  const records = hourlyRecords(run);

  return {
    generationW: records.map((record) => record.generationW),
    consumptionW: records.map((record) => record.consumptionW),
    batteryLevelWh: records.map((record) => record.batteryLevelWh),
  };
};

export const applianceStatusSeries = (run: SimulationRun): readonly ApplianceStatusSeries[] => {
  const records = hourlyRecords(run);
  const names = records[0]?.appliances.map((appliance) => appliance.name) ?? [];

  return names.map((name, index) => ({
    name,
    running: records.map((record) => (record.appliances[index]?.running ? 1 : 0)),
  }));
};
