// src/capabilities.ts

import { Microgrid, NonDispatchableSource } from "./config";
import type { SourceFamily } from "./types";

export interface MicrogridCapabilities {
  hasGenerator: boolean;
  hasStorage: boolean;
  hasPhotovoltaic: boolean;
  hasWind: boolean;
  hasOther: boolean;
  /** family of each non-dispatchable source, in config order */
  sourceFamilies: SourceFamily[];
}

export function sourceFamily(source: NonDispatchableSource): SourceFamily {
  switch (source.family) {
    case "photovoltaic":
    case "wind":
      return source.family;
    default:
      return "other";
  }
}

export function deriveCapabilities(mg: Microgrid): MicrogridCapabilities {
  const sourceFamilies = mg.nondispatchables.map(sourceFamily);

  return {
    hasGenerator: !!mg.generator,
    hasStorage: !!mg.storage,
    hasPhotovoltaic: sourceFamilies.includes("photovoltaic"),
    hasWind: sourceFamilies.includes("wind"),
    hasOther: sourceFamilies.includes("other"),
    sourceFamilies,
  };
}
