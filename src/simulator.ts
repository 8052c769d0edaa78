import { Context, Effect, Layer, Stream } from "effect";
import type { ConfigurationError } from "./errors/configuration.error.js";
import { EventLogger } from "./event-logger/index.js";
import type { IEventLogger } from "./event-logger/types.js";
import type { SimulationStep } from "./events.js";
import { decodeHouseholdDocument } from "./household/document.js";
import type { Household } from "./household/types.js";
import { validateDays, validateHousehold } from "./household/validation.js";
import { iterateSimulation, simulateDays } from "./simulation/simulation-clock.js";
import type { DaySummary, SimulationOptions, SimulationRun } from "./simulation/types.js";

export class Simulator extends Context.Tag("Simulator")<
  Simulator,
  {
    readonly run: (
      household: Household,
      numDays: number,
      options?: SimulationOptions
    ) => Effect.Effect<SimulationRun, ConfigurationError>;
    // Accepts the persisted household document shape as is
    readonly runDocument: (
      document: unknown,
      numDays: number,
      options?: SimulationOptions
    ) => Effect.Effect<SimulationRun, ConfigurationError>;
    readonly stream: (
      household: Household,
      numDays: number,
      options?: SimulationOptions
    ) => Stream.Stream<SimulationStep, ConfigurationError>;
  }
>() {}

export type ISimulator = Context.Tag.Service<typeof Simulator>;

export const SimulatorLayer = (eventLogger: IEventLogger = new EventLogger()): Layer.Layer<Simulator> =>
  Layer.sync(Simulator, () => {
    const reportDay = (summary: DaySummary) =>
      Effect.gen(function* () {
        yield* eventLogger.onDayCompleted(summary);

        for (const runtime of summary.runtimes) {
          if (runtime.deficitHours > 0) {
            yield* eventLogger.onRuntimeDeficit(summary.day, runtime);
          }
        }

        if (summary.curtailedWh > 0) {
          yield* eventLogger.onCurtailment(summary.day, summary.curtailedWh);
        }
      });

    const prepare = (household: Household, numDays: number) =>
      Effect.all([validateHousehold(household), validateDays(numDays)]);

    const run = (household: Household, numDays: number, options: SimulationOptions = {}) =>
      Effect.gen(function* () {
        const [validHousehold, days] = yield* prepare(household, numDays);

        yield* Effect.logDebug("Starting simulation", {
          days,
          appliances: validHousehold.appliances.length,
          policy: options.policy ?? "whenever-possible",
        });

        const result = simulateDays(validHousehold, days, options);

        yield* Effect.forEach(result.days, (day) => reportDay(day.summary), { discard: true });

        return result;
      }).pipe(Effect.withSpan("Simulator.run"));

    const runDocument = (document: unknown, numDays: number, options: SimulationOptions = {}) =>
      decodeHouseholdDocument(document).pipe(
        Effect.flatMap((household) => run(household, numDays, options))
      );

    const stream = (household: Household, numDays: number, options: SimulationOptions = {}) =>
      Stream.unwrap(
        prepare(household, numDays).pipe(
          Effect.map(([validHousehold, days]) =>
            Stream.fromIterable<SimulationStep>({
              [Symbol.iterator]: () => iterateSimulation(validHousehold, days, options),
            }).pipe(
              Stream.tap((step) => (step._tag === "DayEnd" ? reportDay(step.summary) : Effect.void))
            )
          )
        )
      );

    return Simulator.of({ run, runDocument, stream });
  });
