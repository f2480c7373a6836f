import type { Project, SimpleSource } from "../config";
import { annuityCosts } from "../annuity/annuity";
import type { ComponentCosts } from "../types";
import { validateProject, validateSource } from "../validation/validate";

/**
 * Costs of a single-lifetime renewable source (PV panel + inverter as one block, wind turbine).
 */
export function nonDispatchableCosts(nd: SimpleSource, project: Project): ComponentCosts {
  validateProject("NonDispatchable", project);
  validateSource("NonDispatchable", nd, "source");
  return nonDispatchableCostsUnchecked(nd, project);
}

export function nonDispatchableCostsUnchecked(nd: SimpleSource, project: Project): ComponentCosts {
  return annuityCosts(project, {
    quantity: nd.powerRated,
    investmentPrice: nd.investmentPrice,
    replacementPrice: nd.investmentPrice * nd.replacementPriceRatio,
    salvagePrice: nd.investmentPrice * nd.salvagePriceRatio,
    omPrice: nd.omPrice,
    lifetime: nd.lifetime,
  });
}
