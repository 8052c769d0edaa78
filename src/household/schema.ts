import { Schema } from "effect";

// "HH:mm", with "24:00" allowed as the end of the day
const CLOCK_TIME_PATTERN = /^(?:([01]\d|2[0-3]):([0-5]\d)|24:00)$/;

export const parseClockTime = (value: string): number => {
  const [hours = "0", minutes = "0"] = value.split(":");
  return Number(hours) + Number(minutes) / 60;
};

export const formatClockTime = (hours: number): string => {
  const totalMinutes = Math.round(hours * 60);
  const pad = (value: number) => String(value).padStart(2, "0");

  return `${pad(Math.floor(totalMinutes / 60))}:${pad(totalMinutes % 60)}`;
};

// Decodes to fractional hours (e.g. "06:30" -> 6.5)
export const ClockTime = Schema.transform(
  Schema.String.pipe(Schema.pattern(CLOCK_TIME_PATTERN)),
  Schema.Number,
  {
    strict: true,
    decode: parseClockTime,
    encode: formatClockTime,
  }
);

const PRIORITY_LEVELS = {
  High: 1,
  Medium: 2,
  Low: 3,
} as const;

const PriorityLabel = Schema.Literal("High", "Medium", "Low");

// Integers pass through; the High/Medium/Low labels map onto 1-3
export const Priority = Schema.Union(
  Schema.Int,
  Schema.transform(PriorityLabel, Schema.Int, {
    strict: true,
    decode: (label) => PRIORITY_LEVELS[label],
    encode: (level) => (level <= PRIORITY_LEVELS.High ? "High" : level === PRIORITY_LEVELS.Medium ? "Medium" : "Low"),
  })
);

const ComponentSchema = Schema.Struct({
  name: Schema.String,
  capacity: Schema.Number,
});

const ApplianceDocumentSchema = Schema.Struct({
  name: Schema.String,
  power: Schema.Number,
  priority: Priority,
  start_time: ClockTime,
  end_time: ClockTime,
  min_runtime: Schema.Number,
});

export const HouseholdDocumentSchema = Schema.Struct({
  solar_panel: Schema.NullOr(ComponentSchema), // watts
  battery: Schema.NullOr(ComponentSchema), // watt-hours
  charge_controller: Schema.NullOr(ComponentSchema), // amps
  inverter: Schema.NullOr(ComponentSchema), // watts
  appliances: Schema.Array(ApplianceDocumentSchema),
  sunrise: ClockTime,
  sunset: ClockTime,
  system_voltage: Schema.Number,
});

export type HouseholdDocument = typeof HouseholdDocumentSchema.Type;

export const HouseholdDocumentJson = Schema.parseJson(HouseholdDocumentSchema, { space: 2 });
