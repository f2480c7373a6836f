// src/adapters/index.ts
import type { NonDispatchableSource, Project } from "../config";
import type { ComponentCosts } from "../types";
import { nonDispatchableCosts, nonDispatchableCostsUnchecked } from "./nondispatchable";
import { pvInverterCosts, pvInverterCostsUnchecked } from "./pvInverter";

export { nonDispatchableCosts } from "./nondispatchable";
export { pvInverterCosts } from "./pvInverter";
export { generatorCosts, generatorSchedule } from "./generator";
export { batteryCosts, batteryLifetime } from "./battery";

/**
 * Picks the cost model from the source's `type`.
 */
export function sourceCosts(src: NonDispatchableSource, project: Project): ComponentCosts {
  switch (src.type) {
    case "pv-inverter":
      return pvInverterCosts(src, project);
    case "simple":
      return nonDispatchableCosts(src, project);
  }
}

/** sourceCosts for a source and project validated by the caller */
export function sourceCostsUnchecked(src: NonDispatchableSource, project: Project): ComponentCosts {
  switch (src.type) {
    case "pv-inverter":
      return pvInverterCostsUnchecked(src, project);
    case "simple":
      return nonDispatchableCostsUnchecked(src, project);
  }
}
