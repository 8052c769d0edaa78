import type { IEventLogger } from "./types.js";
import type { ApplianceDayRuntime, DaySummary } from "../simulation/types.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onDayCompleted(summary: DaySummary) {
    return Effect.logInfo(`Day ${summary.day + 1} simulated`, {
      generationWh: Math.round(summary.generationWh),
      consumptionWh: Math.round(summary.consumptionWh),
      endBatteryLevelWh: Math.round(summary.endBatteryLevelWh),
    });
  }

  public onRuntimeDeficit(day: number, runtime: ApplianceDayRuntime) {
    return Effect.logWarning(
      `${runtime.name} ran ${runtime.hoursRun}h of its ${runtime.minRuntimeHours}h minimum on day ${day + 1}`,
      { deficitHours: runtime.deficitHours, cumulativeDeficitHours: runtime.cumulativeDeficitHours }
    );
  }

  public onCurtailment(day: number, curtailedWh: number) {
    return Effect.logDebug(`Curtailed ${curtailedWh.toFixed(1)} Wh of generation on day ${day + 1}`);
  }
}
