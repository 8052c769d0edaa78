import type { DaySummary, HourlyRecord } from "./simulation/types.js";

export type SimulationStep =
  | { readonly _tag: "Hour"; readonly record: HourlyRecord }
  | { readonly _tag: "DayEnd"; readonly summary: DaySummary };
