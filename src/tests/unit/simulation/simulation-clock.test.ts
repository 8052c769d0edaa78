import { describe, it, expect } from "@effect/vitest";
import type { SimulationStep } from "../../../events.js";
import { hourlyRecords, simulateDays } from "../../../simulation/simulation-clock.js";
import { appliance, household } from "../fixtures.js";

const pumpHousehold = household([
  appliance({ name: "Pump", powerW: 200, priority: 1, startHour: 8, endHour: 16, minRuntimeHours: 4 }),
]);

const runningHours = (records: ReturnType<typeof hourlyRecords>, name: string) =>
  records
    .filter((record) => record.appliances.find((state) => state.name === name)?.running)
    .map((record) => record.hour);

describe("SimulationClock", () => {
  describe("simulateDays", () => {
    it("should produce 24 records per day with day-qualified indexes", () => {
      const run = simulateDays(pumpHousehold, 2);

      expect(run.days).toHaveLength(2);
      expect(run.days.map((day) => day.hours.length)).toEqual([24, 24]);
      expect(hourlyRecords(run).map((record) => record.index)).toEqual(
        Array.from({ length: 48 }, (_, index) => index)
      );
      expect(run.days[1]?.hours[5]).toMatchObject({ day: 1, hour: 5, index: 29 });
    });

    it("should meet a 4h minimum from an empty battery when the sun allows", () => {
      const run = simulateDays(pumpHousehold, 1, { initialChargeWh: 0 });
      const records = hourlyRecords(run);

      const hours = runningHours(records, "Pump");
      expect(hours).toEqual([8, 9, 10, 11, 12, 13, 14, 15]);
      expect(hours.filter((hour) => hour < 16).length).toBeGreaterThanOrEqual(4);
      expect(records.filter((record) => hours.includes(record.hour)).every((r) => r.generationW >= 200)).toBe(true);

      expect(run.days[0]?.summary.runtimes).toEqual([
        { name: "Pump", hoursRun: 8, minRuntimeHours: 4, deficitHours: 0, cumulativeDeficitHours: 0 },
      ]);
    });

    it("should total generation and consumption per day", () => {
      const summary = simulateDays(pumpHousehold, 1, { initialChargeWh: 0 }).days[0]?.summary;

      expect(summary?.generationWh).toBeCloseTo(6500, 6);
      expect(summary?.consumptionWh).toBe(1600);
      expect(summary?.curtailedWh).toBeCloseTo(6500 - 1600 - 2000, 6);
      expect(summary?.endBatteryLevelWh).toBe(2000);
    });

    it("should curtail generation beyond the battery headroom at noon without counting it elsewhere", () => {
      const records = hourlyRecords(simulateDays(pumpHousehold, 1, { initialChargeWh: 0 }));
      const noon = records[12];

      expect(noon?.generationW).toBe(1000);
      expect(noon?.batteryDeltaWh).toBeCloseTo(50, 6);
      expect(noon?.curtailedWh).toBeCloseTo(750, 6);
      expect(noon?.batteryLevelWh).toBe(2000);

      for (const record of records) {
        expect(record.batteryDeltaWh).toBeLessThanOrEqual(record.generationW);
        expect(record.batteryDeltaWh + record.curtailedWh).toBeCloseTo(
          record.generationW - record.consumptionW,
          6
        );
      }
    });

    it("should curtail all of noon generation when the battery is already full", () => {
      const noon = hourlyRecords(simulateDays(household([]), 1))[12];

      expect(noon).toMatchObject({ generationW: 1000, batteryDeltaWh: 0, curtailedWh: 1000, batteryLevelWh: 2000 });
    });

    it("should cap charging at the charge controller throughput", () => {
      const records = hourlyRecords(
        simulateDays(household([], { chargeControllerMaxW: 300, sunsetHour: 20 }), 1, { initialChargeWh: 0 })
      );

      expect(records[12]?.batteryLevelWh).toBeCloseTo(1600, 6);
      expect(records[13]).toMatchObject({ generationW: 1000 });
      expect(records[13]?.batteryDeltaWh).toBeCloseTo(300, 6);
      expect(records[13]?.curtailedWh).toBeCloseTo(700, 6);
    });

    it("should cap the budget at the inverter output", () => {
      const run = simulateDays(
        household(
          [appliance({ name: "Lights", powerW: 200, priority: 1 }), appliance({ name: "Radio", powerW: 100, priority: 2 })],
          { inverterMaxOutputW: 250 }
        ),
        1
      );
      const midnight = run.days[0]?.hours[0];

      expect(midnight?.budgetW).toBe(250);
      expect(midnight?.consumptionW).toBe(200);
      expect(midnight?.appliances.map((state) => state.status)).toEqual(["running", "shed"]);
      expect(midnight?.batteryLevelWh).toBe(1800);
      expect(midnight?.batteryDeltaWh).toBe(-200);
    });

    it("should report, not fail on, an appliance that can never be powered", () => {
      const run = simulateDays(
        household([appliance({ name: "Kiln", powerW: 5000, startHour: 8, endHour: 16, minRuntimeHours: 4 })]),
        2
      );

      expect(run.days.map((day) => day.summary.runtimes[0])).toEqual([
        { name: "Kiln", hoursRun: 0, minRuntimeHours: 4, deficitHours: 4, cumulativeDeficitHours: 4 },
        { name: "Kiln", hoursRun: 0, minRuntimeHours: 4, deficitHours: 4, cumulativeDeficitHours: 8 },
      ]);
      expect(run.days[0]?.hours[12]?.appliances[0]).toEqual({
        name: "Kiln",
        running: false,
        mustRun: true,
        status: "shed",
      });
      // The previous day's deficit does not make the next morning urgent
      expect(run.days[1]?.hours[8]?.appliances[0]?.mustRun).toBe(false);
    });

    it("should reset hours run today at each day boundary", () => {
      const run = simulateDays(pumpHousehold, 3, { initialChargeWh: 0, policy: "until-minimum-met" });

      expect(run.days.map((day) => day.summary.runtimes[0]?.hoursRun)).toEqual([4, 4, 4]);
      for (const day of run.days) {
        expect(runningHours(day.hours, "Pump")).toEqual([8, 9, 10, 11]);
      }
    });

    it("should carry the battery charge across days", () => {
      const run = simulateDays(pumpHousehold, 2, { initialChargeWh: 0 });

      expect(run.days[1]?.hours[0]?.batteryLevelWh).toBe(run.days[0]?.summary.endBatteryLevelWh);
    });

    it("should start from a full battery by default", () => {
      expect(simulateDays(household([]), 1).days[0]?.hours[0]?.batteryLevelWh).toBe(2000);
    });

    it("should be deterministic", () => {
      const appliances = [
        appliance({ name: "Fridge", powerW: 150, priority: 1 }),
        appliance({ name: "Pump", powerW: 400, priority: 2, startHour: 9, endHour: 16, minRuntimeHours: 3 }),
        appliance({ name: "Washer", powerW: 500, priority: 2, startHour: 10, endHour: 15, minRuntimeHours: 2 }),
      ];

      const first = simulateDays(household(appliances), 3, { initialChargeWh: 300 });
      const second = simulateDays(household(appliances), 3, { initialChargeWh: 300 });

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it("should report every step to onStep", () => {
      const steps: SimulationStep[] = [];

      simulateDays(pumpHousehold, 2, { onStep: (step) => steps.push(step) });

      expect(steps).toHaveLength(50);
      expect(steps.filter((step) => step._tag === "DayEnd")).toHaveLength(2);
      expect(steps[24]?._tag).toBe("DayEnd");
    });
  });
});
