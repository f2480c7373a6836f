import type { PVInverter, Project } from "../config";
import { addCosts, annuityCosts } from "../annuity/annuity";
import type { ComponentCosts } from "../types";
import { validateProject, validateSource } from "../validation/validate";

/**
 * AC inverter and DC panels have their own prices and lifetimes.
 * Both are costed apart, then summed term by term.
 */
export function pvInverterCosts(pvi: PVInverter, project: Project): ComponentCosts {
  validateProject("PVInverter", project);
  validateSource("PVInverter", pvi, "source");
  return pvInverterCostsUnchecked(pvi, project);
}

export function pvInverterCostsUnchecked(pvi: PVInverter, project: Project): ComponentCosts {
  const ac = annuityCosts(project, {
    quantity: pvi.powerRated,
    investmentPrice: pvi.investmentPriceAc,
    replacementPrice: pvi.investmentPriceAc * pvi.replacementPriceRatio,
    salvagePrice: pvi.investmentPriceAc * pvi.salvagePriceRatio,
    omPrice: pvi.omPriceAc,
    lifetime: pvi.lifetimeAc,
  });

  const dc = annuityCosts(project, {
    quantity: pvi.powerRated * pvi.ilr, // DC rated power
    investmentPrice: pvi.investmentPriceDc,
    replacementPrice: pvi.investmentPriceDc * pvi.replacementPriceRatio,
    salvagePrice: pvi.investmentPriceDc * pvi.salvagePriceRatio,
    omPrice: pvi.omPriceDc,
    lifetime: pvi.lifetimeDc,
  });

  return addCosts(ac, dc);
}
