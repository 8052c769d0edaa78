import type { ApplianceSpec } from "../household/types.js";
import { hourlyRecords } from "../simulation/simulation-clock.js";
import type { DaySummary, HourlyRecord, SimulationRun } from "../simulation/types.js";

export const totalPowerConsumption = (appliances: readonly ApplianceSpec[]): number =>
  appliances.reduce((total, appliance) => total + appliance.powerW, 0);

/**
 * Record under a dial position counted in hours from the start of the run.
 * The dial wraps, so positions past the last hour start over at day 1.
 */
export const hourAtDial = (run: SimulationRun, position: number): HourlyRecord | null => {
  const records = hourlyRecords(run);

  if (records.length === 0 || !Number.isInteger(position)) {
    return null;
  }

  return records[((position % records.length) + records.length) % records.length] ?? null;
};

export const formatHourReport = (record: HourlyRecord, systemVoltage: number): string => {
  const running = record.appliances.filter((appliance) => appliance.running);
  const unmet = record.appliances.filter((appliance) => appliance.status === "shed" && appliance.mustRun);

  const lines = [
    `Day ${record.day + 1}, Hour ${record.hour}:`,
    `Solar generation: ${record.generationW.toFixed(2)} Wh`,
    `Power used: ${record.consumptionW.toFixed(2)} Wh`,
    `Battery charge: ${record.batteryLevelWh.toFixed(2)} Wh (${(record.batteryLevelWh / systemVoltage).toFixed(2)} Ah at ${systemVoltage}V)`,
    `Curtailed: ${record.curtailedWh.toFixed(2)} Wh`,
    "Appliances running:",
    ...(running.length > 0 ? running.map((appliance) => `  - ${appliance.name}`) : ["  (none)"]),
  ];

  if (unmet.length > 0) {
    lines.push("Short of minimum runtime:", ...unmet.map((appliance) => `  - ${appliance.name}`));
  }

  return lines.join("\n");
};

export const formatDaySummary = (summary: DaySummary): string =>
  [
    `Day ${summary.day + 1} summary:`,
    `Generated ${summary.generationWh.toFixed(2)} Wh, used ${summary.consumptionWh.toFixed(2)} Wh, curtailed ${summary.curtailedWh.toFixed(2)} Wh, battery at end ${summary.endBatteryLevelWh.toFixed(2)} Wh`,
    ...summary.runtimes.map((runtime) =>
      runtime.deficitHours > 0
        ? `  ${runtime.name}: ${runtime.hoursRun}/${runtime.minRuntimeHours} h (deficit ${runtime.deficitHours} h, ${runtime.cumulativeDeficitHours} h so far)`
        : `  ${runtime.name}: ${runtime.hoursRun}/${runtime.minRuntimeHours} h`
    ),
  ].join("\n");
