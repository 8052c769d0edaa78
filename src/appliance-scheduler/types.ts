import type { ApplianceSpec } from "../household/types.js";

// whenever-possible: optional appliances run whenever they fit the budget
// until-minimum-met: an appliance stops for the day once it has run its minimum
export type RunPolicy = "whenever-possible" | "until-minimum-met";

export type ApplianceStatus = "running" | "outside-window" | "shed" | "satisfied";

export type ApplianceRuntime = {
  readonly name: string;
  readonly hoursRunToday: number;
  readonly cumulativeDeficitHours: number;
};

export type ApplianceHourState = {
  readonly name: string;
  readonly running: boolean;
  readonly mustRun: boolean;
  readonly status: ApplianceStatus;
};

export type ScheduleHourInput = {
  readonly hour: number;
  readonly budgetW: number;
  readonly appliances: readonly ApplianceSpec[];
  readonly runtimes: readonly ApplianceRuntime[]; // aligned with appliances by index
  readonly policy?: RunPolicy;
};

export type ScheduleHourResult = {
  readonly states: readonly ApplianceHourState[];
  readonly consumptionW: number;
  readonly remainingBudgetW: number;
  readonly runtimes: readonly ApplianceRuntime[];
};
