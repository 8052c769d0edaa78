import { scheduleHour } from "../appliance-scheduler/index.js";
import type { ApplianceRuntime, RunPolicy } from "../appliance-scheduler/types.js";
import { applyDelta, availableCharge, createBatteryState, type BatteryState } from "../battery-state.js";
import type { SimulationStep } from "../events.js";
import { generationAt } from "../generation-model/solar-curve.js";
import type { ApplianceSpec, Household, SystemConfig } from "../household/types.js";
import {
  HOURS_PER_DAY,
  type ApplianceDayRuntime,
  type DaySummary,
  type HourlyRecord,
  type SimulationDay,
  type SimulationOptions,
  type SimulationRun,
} from "./types.js";

type HourInput = {
  readonly system: SystemConfig;
  readonly appliances: readonly ApplianceSpec[];
  readonly battery: BatteryState;
  readonly runtimes: readonly ApplianceRuntime[];
  readonly day: number;
  readonly hour: number;
  readonly policy: RunPolicy;
};

type HourOutcome = {
  readonly record: HourlyRecord;
  readonly battery: BatteryState;
  readonly runtimes: readonly ApplianceRuntime[];
};

const simulateHour = ({
  system,
  appliances,
  battery,
  runtimes,
  day,
  hour,
  policy,
}: HourInput): HourOutcome => {
  const generationW = generationAt(hour, system.sunriseHour, system.sunsetHour, system.solarPanelCapacityW);
  const budgetW = Math.min(generationW + availableCharge(battery), system.inverterMaxOutputW);

  const schedule = scheduleHour({ hour, budgetW, appliances, runtimes, policy });

  // One hour at a constant power, so W and Wh coincide
  const netWh = generationW - schedule.consumptionW;
  const requestedWh = netWh > 0 ? Math.min(netWh, system.chargeControllerMaxW) : netWh;
  const { state, appliedWh } = applyDelta(battery, requestedWh);

  return {
    record: {
      day,
      hour,
      index: day * HOURS_PER_DAY + hour,
      generationW,
      budgetW,
      consumptionW: schedule.consumptionW,
      batteryLevelWh: state.chargeWh,
      batteryDeltaWh: appliedWh,
      curtailedWh: netWh > 0 ? netWh - appliedWh : 0,
      appliances: schedule.states,
    },
    battery: state,
    runtimes: schedule.runtimes,
  };
};

/**
 * Steps through `numDays` days hour by hour. Expects a validated household.
 * Battery charge carries over day boundaries; hours run today do not, and a
 * day's unmet minimum runtime never raises the next day's urgency.
 */
export function* iterateSimulation(
  household: Household,
  numDays: number,
  options: SimulationOptions = {}
): Generator<SimulationStep, void, undefined> {
  const { system, appliances } = household;
  const policy = options.policy ?? "whenever-possible";

  let battery = createBatteryState(system.batteryCapacityWh, options.initialChargeWh);
  let runtimes: readonly ApplianceRuntime[] = appliances.map((appliance) => ({
    name: appliance.name,
    hoursRunToday: 0,
    cumulativeDeficitHours: 0,
  }));

  const emit = (step: SimulationStep): SimulationStep => {
    options.onStep?.(step);
    return step;
  };

  for (let day = 0; day < numDays; day++) {
    runtimes = runtimes.map((runtime) => ({ ...runtime, hoursRunToday: 0 }));

    let generationWh = 0;
    let consumptionWh = 0;
    let curtailedWh = 0;

    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
      const outcome = simulateHour({ system, appliances, battery, runtimes, day, hour, policy });

      battery = outcome.battery;
      runtimes = outcome.runtimes;
      generationWh += outcome.record.generationW;
      consumptionWh += outcome.record.consumptionW;
      curtailedWh += outcome.record.curtailedWh;

      yield emit({ _tag: "Hour", record: outcome.record });
    }

    const dayRuntimes: ApplianceDayRuntime[] = appliances.map((appliance, index) => {
      const hoursRun = runtimes[index]?.hoursRunToday ?? 0;
      const deficitHours = Math.max(0, appliance.minRuntimeHours - hoursRun);

      return {
        name: appliance.name,
        hoursRun,
        minRuntimeHours: appliance.minRuntimeHours,
        deficitHours,
        cumulativeDeficitHours: (runtimes[index]?.cumulativeDeficitHours ?? 0) + deficitHours,
      };
    });

    runtimes = runtimes.map((runtime, index) => ({
      ...runtime,
      cumulativeDeficitHours: dayRuntimes[index]?.cumulativeDeficitHours ?? runtime.cumulativeDeficitHours,
    }));

    const summary: DaySummary = {
      day,
      generationWh,
      consumptionWh,
      curtailedWh,
      endBatteryLevelWh: battery.chargeWh,
      runtimes: dayRuntimes,
    };

    yield emit({ _tag: "DayEnd", summary });
  }
}

export const simulateDays = (
  household: Household,
  numDays: number,
  options: SimulationOptions = {}
): SimulationRun => {
  const days: SimulationDay[] = [];
  let hours: HourlyRecord[] = [];

  for (const step of iterateSimulation(household, numDays, options)) {
    if (step._tag === "Hour") {
      hours.push(step.record);
    } else {
      days.push({ day: step.summary.day, hours, summary: step.summary });
      hours = [];
    }
  }

  return { days };
};

export const hourlyRecords = (run: SimulationRun): readonly HourlyRecord[] =>
  run.days.flatMap((day) => day.hours);
