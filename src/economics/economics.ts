// src/economics/economics.ts

import type { Microgrid } from "../config";
import { sourceFamily } from "../capabilities";
import { ZERO_COSTS, sumCosts } from "../annuity/annuity";
import { sourceCostsUnchecked } from "../adapters";
import { batteryCostsUnchecked } from "../adapters/battery";
import { generatorCostsUnchecked } from "../adapters/generator";
import { DegenerateComputationError } from "../errors";
import type {
  ComponentCosts,
  CostCategory,
  EconomicsEnv,
  Logger,
  MicrogridCosts,
  OperationStats,
} from "../types";
import { COST_CATEGORIES } from "../types";
import { capitalRecoveryFactor, discountFactors, sum } from "../utils/discount";
import { validateMicrogrid, validateOperationStats } from "../validation/validate";

const SILENT: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Served energy over the horizon: year 1 undiscounted, years 2..N discounted
 * with factors d_1..d_{N-1}.
 */
export function lifetimeServedEnergy(servedEnergy: number, discountRate: number, horizon: number): number {
  const df = discountFactors(discountRate, horizon);
  return servedEnergy * sum([1.0, ...df.slice(0, df.length - 1)]);
}

/**
 * Economics of microgrid `mg` given the aggregated yearly operation statistics.
 *
 * Parameters are validated once here; the adapters are then called without
 * their own guards. Throws InvalidConfigurationError on bad parameters and
 * DegenerateComputationError when no energy is served.
 */
export function economics(mg: Microgrid, operStats: OperationStats, env: EconomicsEnv = {}): MicrogridCosts {
  const log = env.logger ?? SILENT;

  validateMicrogrid("Economics", mg);
  validateOperationStats("Economics", operStats);
  if (operStats.servedEnergy === 0) {
    throw new DegenerateComputationError("Economics: servedEnergy is 0, COE and LCOE are undefined");
  }

  const { project } = mg;

  // (category, costs) pairs, folded below
  const entries: Array<[CostCategory, ComponentCosts]> = [];

  mg.nondispatchables.forEach((src, i) => {
    const family = sourceFamily(src);
    if (family === "other") {
      log.warn("Economics: non-dispatchable source costed outside photovoltaic/wind", { index: i, type: src.type });
    }
    entries.push([family, sourceCostsUnchecked(src, project)]);
  });

  if (mg.generator) {
    if (operStats.genHours === 0) {
      log.warn("Economics: generator configured but never runs", { genHours: 0 });
      if (operStats.genFuel > 0) {
        log.warn("Economics: generator burns fuel without running hours", { genFuel: operStats.genFuel });
      }
    }
    entries.push(["generator", generatorCostsUnchecked(mg.generator, project, operStats)]);
  }

  if (mg.storage) {
    entries.push(["battery", batteryCostsUnchecked(mg.storage, project, operStats)]);
  }

  const inCategory = (category: CostCategory) =>
    sumCosts(entries.filter(([c]) => c === category).map(([, costs]) => costs));
  const categories: Record<CostCategory, ComponentCosts> = {
    generator: inCategory("generator"),
    battery: inCategory("battery"),
    photovoltaic: inCategory("photovoltaic"),
    wind: inCategory("wind"),
    other: inCategory("other"),
  };

  const perCategory = COST_CATEGORIES.map((c) => categories[c]);
  for (const c of COST_CATEGORIES) {
    if (categories[c] !== ZERO_COSTS) log.debug(`Economics: ${c} costs`, { ...categories[c] });
  }

  const investment = sum(perCategory.map((c) => c.investment));
  const replacement = sum(perCategory.map((c) => c.replacement));
  const om = sum(perCategory.map((c) => c.om));
  const fuel = sum(perCategory.map((c) => c.fuel));
  const salvage = sum(perCategory.map((c) => c.salvage));
  const npc = sum(perCategory.map((c) => c.total));

  const crf = capitalRecoveryFactor(project.discountRate, project.lifetime);
  const annualizedCost = npc * crf;
  const coe = annualizedCost / operStats.servedEnergy;

  const energyLifetime = lifetimeServedEnergy(operStats.servedEnergy, project.discountRate, project.lifetime);
  const lcoe = npc / energyLifetime;

  log.debug("Economics: summary", { npc, annualizedCost, coe, lcoe });

  return {
    lcoe,
    coe,
    npc,
    annualizedCost,
    crf,
    lifetimeServedEnergy: energyLifetime,
    currency: project.currency,
    investment,
    replacement,
    om,
    fuel,
    salvage,
    categories,
  };
}
