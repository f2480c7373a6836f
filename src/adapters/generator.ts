import type { DispatchableGenerator, Project } from "../config";
import { componentCosts } from "../annuity/annuity";
import type { ComponentCosts, OperationStats } from "../types";
import { discountFactor, discountFactors, sum } from "../utils/discount";
import { nonNegative, validateGenerator, validateProject } from "../validation/validate";

export interface GeneratorSchedule {
  /** operating hours over the whole horizon */
  totalHours: number;
  count: number;
  /** fractional years at which the worn-out generator is swapped */
  years: number[];
  /** operating hours left at the end of the horizon */
  remainingHours: number;
}

/**
 * Hour-based wear: the yearly run hours are assumed constant over the horizon,
 * so the k-th replacement falls at k × lifetimeHours / genHours years.
 * A generator that never runs is never replaced and keeps its full life; it
 * accrues no O&M, while fuel still follows `genFuel`.
 */
export function generatorSchedule(horizon: number, lifetimeHours: number, genHours: number): GeneratorSchedule {
  const totalHours = horizon * genHours;
  const count = genHours > 0 ? Math.ceil(totalHours / lifetimeHours) - 1 : 0;

  const years: number[] = [];
  for (let i = 1; i <= count; i++) years.push(i * (lifetimeHours / genHours));

  return {
    totalHours,
    count,
    years,
    remainingHours: lifetimeHours - (totalHours - lifetimeHours * count),
  };
}

/**
 * Dispatchable generator costs. O&M and fuel follow actual run hours and fuel
 * use of the representative year; salvage is stored negative like every other
 * ComponentCosts.
 */
export function generatorCosts(
  dg: DispatchableGenerator,
  project: Project,
  operStats: OperationStats
): ComponentCosts {
  validateProject("Generator", project);
  validateGenerator("Generator", dg);
  nonNegative("Generator", "operStats.genHours", operStats.genHours);
  nonNegative("Generator", "operStats.genFuel", operStats.genFuel);
  return generatorCostsUnchecked(dg, project, operStats);
}

export function generatorCostsUnchecked(
  dg: DispatchableGenerator,
  project: Project,
  operStats: OperationStats
): ComponentCosts {
  const N = project.lifetime;
  const r = project.discountRate;
  const df = discountFactors(r, N);

  const schedule = generatorSchedule(N, dg.lifetimeHours, operStats.genHours);

  const investment = dg.investmentPrice * dg.powerRated;
  const om = sum(df.map((d) => dg.omPriceHours * dg.powerRated * operStats.genHours * d));
  const replacement =
    schedule.count === 0
      ? 0
      : sum(schedule.years.map((y) => dg.replacementPriceRatio * investment * discountFactor(r, y)));

  let salvage = 0;
  if (schedule.remainingHours !== 0) {
    const nominalSalvage = (dg.salvagePriceRatio * investment * schedule.remainingHours) / dg.lifetimeHours;
    salvage = 0 - nominalSalvage * df[N - 1];
  }

  const fuel = sum(df.map((d) => dg.fuelPrice * operStats.genFuel * d));

  return componentCosts({ investment, replacement, om, fuel, salvage });
}
