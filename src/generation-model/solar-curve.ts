// Normalised output sampled evenly from sunrise to sunset, peak 1.0 at solar noon.
export const SOLAR_CURVE: readonly number[] = [
  0, 0.1, 0.3, 0.5, 0.7, 0.8, 0.9, 1.0, 0.9, 0.8, 0.7, 0.5, 0.3, 0.1, 0,
];

/**
 * Fraction of peak output `offsetHours` after sunrise, for a day with
 * `daylightHours` of sun. Points between table entries are interpolated linearly.
 */
export const curveFraction = (offsetHours: number, daylightHours: number): number => {
  if (daylightHours <= 0 || offsetHours < 0 || offsetHours > daylightHours) {
    return 0;
  }

  const lastIndex = SOLAR_CURVE.length - 1;
  const position = (offsetHours * lastIndex) / daylightHours;
  const lower = Math.floor(position);
  const upper = Math.min(lower + 1, lastIndex);

  const lowerValue = SOLAR_CURVE[lower] ?? 0;
  const upperValue = SOLAR_CURVE[upper] ?? 0;

  return lowerValue + (upperValue - lowerValue) * (position - lower);
};

export const generationAt = (
  hour: number,
  sunriseHour: number,
  sunsetHour: number,
  panelCapacityW: number
): number => {
  // No sun outside [sunrise, sunset)
  if (hour < sunriseHour || hour >= sunsetHour) {
    return 0;
  }

  return panelCapacityW * curveFraction(hour - sunriseHour, sunsetHour - sunriseHour);
};
