#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Logger, LogLevel, Option } from "effect"
import * as Sentry from "@sentry/node";
import { AppConfig } from './config.js';
import { reportFailure } from './error-reporting.js';
import { HouseholdFile } from './household/household-file.js';
import { serviceLayers } from './layers.js';
import { formatDaySummary, formatHourReport, hourAtDial, totalPowerConsumption } from './report/hour-report.js';
import { Simulator } from './simulator.js';

const isProd = process.env.NODE_ENV == 'production';

// Without a DSN the SDK stays disabled
Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const argValue = (name: string): string | undefined =>
  process.argv.find((arg) => arg.startsWith(`--${name}=`))?.slice(name.length + 3);


const program = Effect.gen(function*() {
  const householdFile = yield* HouseholdFile;
  const simulator = yield* Simulator;

  const path = yield* AppConfig.householdFile;
  const days = yield* AppConfig.simulation.days;
  const policy = yield* AppConfig.simulation.policy;
  const initialChargeWh = yield* AppConfig.simulation.initialBatteryChargeWh;

  const household = yield* householdFile.load(path);
  const voltage = household.system.systemVoltage;

  yield* Effect.logInfo(`Simulating ${days} day(s) from ${path}`, {
    appliances: household.appliances.length,
    totalPowerConsumptionW: totalPowerConsumption(household.appliances),
    policy,
  });

  const run = yield* simulator.run(household, days, {
    policy,
    initialChargeWh: Option.getOrUndefined(initialChargeWh),
  });

  const dialPosition = argValue('hour');

  if (dialPosition !== undefined) {
    const record = hourAtDial(run, Number(dialPosition));

    if (record === null) {
      yield* Effect.logWarning(`No simulated hour at dial position ${dialPosition}`);
    } else {
      yield* Console.log(formatHourReport(record, voltage));
    }
  } else {
    const summaryOnly = process.argv.includes('--summary');

    for (const day of run.days) {
      if (!summaryOnly) {
        for (const record of day.hours) {
          yield* Console.log(formatHourReport(record, voltage));
        }
      }

      yield* Console.log(formatDaySummary(day.summary));
    }
  }

  const savePath = argValue('save');

  if (savePath !== undefined) {
    yield* householdFile.save(savePath, household);
    yield* Effect.logInfo(`Saved household to ${savePath}`);
  }
});

const main = Effect.gen(function*() {
  const logLevel = yield* AppConfig.logLevel;

  yield* program.pipe(
    Logger.withMinimumLogLevel(
      Option.getOrElse(logLevel, () => (isProd ? LogLevel.Info : LogLevel.Debug))
    ),
  );
}).pipe(
  Effect.tapErrorCause(reportFailure),
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
);

NodeRuntime.runMain(main);
