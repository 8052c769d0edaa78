import type { ApplianceHourState, RunPolicy } from "../appliance-scheduler/types.js";
import type { SimulationStep } from "../events.js";

export const HOURS_PER_DAY = 24;

export type HourlyRecord = {
  readonly day: number;
  readonly hour: number; // 0-23
  readonly index: number; // day * 24 + hour
  readonly generationW: number;
  readonly budgetW: number;
  readonly consumptionW: number;
  readonly batteryLevelWh: number; // after this hour's update
  readonly batteryDeltaWh: number; // actually applied, after clamping
  readonly curtailedWh: number;
  readonly appliances: readonly ApplianceHourState[];
};

export type ApplianceDayRuntime = {
  readonly name: string;
  readonly hoursRun: number;
  readonly minRuntimeHours: number;
  readonly deficitHours: number;
  readonly cumulativeDeficitHours: number;
};

export type DaySummary = {
  readonly day: number;
  readonly generationWh: number;
  readonly consumptionWh: number;
  readonly curtailedWh: number;
  readonly endBatteryLevelWh: number;
  readonly runtimes: readonly ApplianceDayRuntime[];
};

export type SimulationDay = {
  readonly day: number;
  readonly hours: readonly HourlyRecord[];
  readonly summary: DaySummary;
};

export type SimulationRun = {
  readonly days: readonly SimulationDay[];
};

export type SimulationOptions = {
  readonly initialChargeWh?: number; // defaults to a full battery
  readonly policy?: RunPolicy;
  readonly onStep?: (step: SimulationStep) => void;
};
