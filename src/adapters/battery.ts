import type { Battery, Project } from "../config";
import { annuityCosts } from "../annuity/annuity";
import type { ComponentCosts, OperationStats } from "../types";
import { nonNegative, validateBattery, validateProject } from "../validation/validate";

/**
 * Lifetime used for costing: the cycling limit at this year's cycling rate,
 * capped by the calendar limit.
 */
export function batteryLifetime(bt: Battery, storageCycles: number): number {
  if (storageCycles > 0) {
    return Math.min(bt.lifetimeCycles / storageCycles, bt.lifetimeCalendar);
  }
  return bt.lifetimeCalendar;
}

export function batteryCosts(bt: Battery, project: Project, operStats: OperationStats): ComponentCosts {
  validateProject("Battery", project);
  validateBattery("Battery", bt);
  nonNegative("Battery", "operStats.storageCycles", operStats.storageCycles);
  return batteryCostsUnchecked(bt, project, operStats);
}

export function batteryCostsUnchecked(bt: Battery, project: Project, operStats: OperationStats): ComponentCosts {
  return annuityCosts(project, {
    quantity: bt.energyRated,
    investmentPrice: bt.investmentPrice,
    replacementPrice: bt.investmentPrice * bt.replacementPriceRatio,
    salvagePrice: bt.investmentPrice * bt.salvagePriceRatio,
    omPrice: bt.omPrice,
    lifetime: batteryLifetime(bt, operStats.storageCycles),
  });
}
