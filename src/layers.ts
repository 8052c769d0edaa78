import { Layer } from "effect";
import { HouseholdFileLayer } from "./household/household-file.js";
import { SimulatorLayer } from "./simulator.js";

export const serviceLayers = Layer.mergeAll(
    SimulatorLayer(),
    HouseholdFileLayer,
);
