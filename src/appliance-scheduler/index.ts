import type { ApplianceSpec } from "../household/types.js";
import type {
  ApplianceHourState,
  ApplianceRuntime,
  ScheduleHourInput,
  ScheduleHourResult,
} from "./types.js";

export type {
  ApplianceHourState,
  ApplianceRuntime,
  ApplianceStatus,
  RunPolicy,
  ScheduleHourInput,
  ScheduleHourResult,
} from "./types.js";

const isInWindow = (appliance: ApplianceSpec, hour: number): boolean =>
  appliance.startHour <= hour && hour < appliance.endHour;

export const hoursStillNeeded = (appliance: ApplianceSpec, hoursRunToday: number): number =>
  Math.max(0, Math.ceil(appliance.minRuntimeHours - hoursRunToday));

/**
 * An appliance must run this hour when the hours left in its window (this one
 * included) equal the hours it still needs today. One that has already fallen
 * behind competes as optional.
 */
export const isMustRun = (appliance: ApplianceSpec, hoursRunToday: number, hour: number): boolean => {
  const needed = hoursStillNeeded(appliance, hoursRunToday);

  return needed > 0 && isInWindow(appliance, hour) && appliance.endHour - hour === needed;
};

type Candidate = {
  readonly index: number;
  readonly appliance: ApplianceSpec;
  readonly mustRun: boolean;
};

// Must-run first, then priority ascending; equal priorities keep declared order.
const compareCandidates = (a: Candidate, b: Candidate): number => {
  if (a.mustRun !== b.mustRun) {
    return a.mustRun ? -1 : 1;
  }

  if (a.appliance.priority !== b.appliance.priority) {
    return a.appliance.priority - b.appliance.priority;
  }

  return a.index - b.index;
};

export const scheduleHour = ({
  hour,
  budgetW,
  appliances,
  runtimes,
  policy = "whenever-possible",
}: ScheduleHourInput): ScheduleHourResult => {
  const hoursRun = appliances.map((_, index) => runtimes[index]?.hoursRunToday ?? 0);

  const statuses: ApplianceHourState["status"][] = appliances.map(() => "outside-window");
  const mustRunFlags: boolean[] = appliances.map(() => false);
  const candidates: Candidate[] = [];

  appliances.forEach((appliance, index) => {
    const hoursRunToday = hoursRun[index] ?? 0;

    if (!isInWindow(appliance, hour)) {
      return;
    }

    const mustRun = isMustRun(appliance, hoursRunToday, hour);
    mustRunFlags[index] = mustRun;

    if (policy === "until-minimum-met" && hoursStillNeeded(appliance, hoursRunToday) === 0) {
      statuses[index] = "satisfied";
      return;
    }

    candidates.push({ index, appliance, mustRun });
  });

  let remainingBudgetW = Math.max(0, budgetW);

  for (const candidate of [...candidates].sort(compareCandidates)) {
    if (candidate.appliance.powerW <= remainingBudgetW) {
      remainingBudgetW -= candidate.appliance.powerW;
      statuses[candidate.index] = "running";
    } else {
      statuses[candidate.index] = "shed";
    }
  }

  const states: ApplianceHourState[] = appliances.map((appliance, index) => {
    const status = statuses[index] ?? "outside-window";

    return {
      name: appliance.name,
      running: status === "running",
      mustRun: mustRunFlags[index] ?? false,
      status,
    };
  });

  const consumptionW = appliances.reduce(
    (total, appliance, index) => (states[index]?.running ? total + appliance.powerW : total),
    0
  );

  const updatedRuntimes: ApplianceRuntime[] = appliances.map((appliance, index) => {
    const previous = runtimes[index];

    return {
      name: appliance.name,
      hoursRunToday: (hoursRun[index] ?? 0) + (states[index]?.running ? 1 : 0),
      cumulativeDeficitHours: previous?.cumulativeDeficitHours ?? 0,
    };
  });

  return {
    states,
    consumptionW,
    remainingBudgetW,
    runtimes: updatedRuntimes,
  };
};
