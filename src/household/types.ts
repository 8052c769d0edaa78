export type SystemConfig = {
  readonly solarPanelCapacityW: number;
  readonly batteryCapacityWh: number;
  readonly chargeControllerMaxW: number; // max power the controller passes into the battery
  readonly inverterMaxOutputW: number; // caps what appliances can draw in one hour
  readonly sunriseHour: number; // fractional hours (e.g. 6.5 = 6:30 AM)
  readonly sunsetHour: number;
  readonly systemVoltage: number; // 12V or 24V in practice
};

export type ApplianceSpec = {
  readonly name: string;
  readonly powerW: number;
  readonly priority: number; // lower value is served first
  readonly startHour: number; // window is [startHour, endHour), no wrap over midnight
  readonly endHour: number;
  readonly minRuntimeHours: number;
};

export type Household = {
  readonly system: SystemConfig;
  readonly appliances: readonly ApplianceSpec[];
};
