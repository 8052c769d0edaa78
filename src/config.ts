import { Config as EffectConfig } from "effect";


export const AppConfig = {
  householdFile: EffectConfig.string("HOUSEHOLD_FILE").pipe(
    EffectConfig.withDefault("household.json")
  ),

  simulation: {
    days: EffectConfig.integer("SIMULATION_DAYS").pipe(EffectConfig.withDefault(3)),
    policy: EffectConfig.literal("whenever-possible", "until-minimum-met")("SIMULATION_POLICY").pipe(
      EffectConfig.withDefault("whenever-possible" as const)
    ),
    initialBatteryChargeWh: EffectConfig.option(EffectConfig.number("INITIAL_BATTERY_CHARGE_WH")),
  },

  logLevel: EffectConfig.option(EffectConfig.logLevel("LOG_LEVEL")),
};
