import type { Effect } from "effect";
import type { ApplianceDayRuntime, DaySummary } from "../simulation/types.js";

export type IEventLogger = {
  onDayCompleted: (summary: DaySummary) => Effect.Effect<void>;
  onRuntimeDeficit: (day: number, runtime: ApplianceDayRuntime) => Effect.Effect<void>;
  onCurtailment: (day: number, curtailedWh: number) => Effect.Effect<void>;
};
