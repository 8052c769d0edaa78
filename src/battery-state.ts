export type BatteryState = {
  readonly chargeWh: number;
  readonly capacityWh: number;
};

export type BatteryDelta = {
  readonly state: BatteryState;
  readonly appliedWh: number; // differs from the request when clamped
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const createBatteryState = (
  capacityWh: number,
  initialChargeWh: number = capacityWh
): BatteryState => ({
  capacityWh,
  chargeWh: Number.isNaN(initialChargeWh) ? capacityWh : clamp(initialChargeWh, 0, capacityWh),
});

/**
 * Adds `requestedWh` (negative to discharge) and clamps to [0, capacity].
 * Energy beyond the headroom is curtailed; a discharge below empty is refused.
 */
export const applyDelta = (state: BatteryState, requestedWh: number): BatteryDelta => {
  if (Number.isNaN(requestedWh)) {
    return { state, appliedWh: 0 };
  }

  const chargeWh = clamp(state.chargeWh + requestedWh, 0, state.capacityWh);

  return {
    state: { ...state, chargeWh },
    appliedWh: chargeWh - state.chargeWh,
  };
};

export const availableHeadroom = (state: BatteryState): number => state.capacityWh - state.chargeWh;

export const availableCharge = (state: BatteryState): number => state.chargeWh;
