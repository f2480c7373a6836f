import type { Project } from "../config";
import type { ComponentCosts } from "../types";
import { discountFactor, discountFactors, sum } from "../utils/discount";
import { nonNegative, positive, validateDiscountRate, validateHorizon } from "../validation/validate";

export type Horizon = Pick<Project, "lifetime" | "discountRate">;

/**
 * Unit prices and lifetime of one cost-bearing asset.
 * Prices are per unit of `quantity` (kW, kWh...), except fuel which is per unit consumed.
 */
export interface AnnuityInputs {
  quantity: number;
  investmentPrice: number;
  replacementPrice: number;
  salvagePrice: number;
  omPrice: number;          // per unit and per year
  fuelConsumption?: number; // per year
  fuelPrice?: number;
  lifetime: number;         // y
}

export interface ReplacementSchedule {
  count: number;
  years: number[];
  /** life left at the end of the horizon, in [0, lifetime) */
  remainingLife: number;
}

/**
 * Report form of ComponentCosts: the salvage credit is a positive
 * `salvageCredit`, so it cannot be mistaken for (or summed as) a ComponentCosts.
 */
export interface DisplayedCosts {
  readonly total: number;
  readonly investment: number;
  readonly replacement: number;
  readonly om: number;
  readonly fuel: number;
  readonly salvageCredit: number;
}

export const ZERO_COSTS: ComponentCosts = Object.freeze({
  total: 0,
  investment: 0,
  replacement: 0,
  om: 0,
  fuel: 0,
  salvage: 0,
});

/**
 * Builds a frozen cost record; `total` is always the sum of the five terms.
 */
export function componentCosts(parts: Omit<ComponentCosts, "total">): ComponentCosts {
  const { investment, replacement, om, fuel, salvage } = parts;
  return Object.freeze({
    total: investment + replacement + om + fuel + salvage,
    investment,
    replacement,
    om,
    fuel,
    salvage,
  });
}

export function addCosts(a: ComponentCosts, b: ComponentCosts): ComponentCosts {
  return componentCosts({
    investment: a.investment + b.investment,
    replacement: a.replacement + b.replacement,
    om: a.om + b.om,
    fuel: a.fuel + b.fuel,
    salvage: a.salvage + b.salvage,
  });
}

export function sumCosts(list: readonly ComponentCosts[]): ComponentCosts {
  return list.reduce(addCosts, ZERO_COSTS);
}

/**
 * Salvage flipped to positive, as reports usually print it.
 */
export function displayCosts(c: ComponentCosts): DisplayedCosts {
  return {
    total: c.total,
    investment: c.investment,
    replacement: c.replacement,
    om: c.om,
    fuel: c.fuel,
    salvageCredit: 0 - c.salvage,
  };
}

/**
 * Replacements happen every `lifetime` years until the asset outlives the horizon.
 */
export function replacementSchedule(horizon: number, lifetime: number): ReplacementSchedule {
  const count = Math.ceil(horizon / lifetime) - 1;
  const years: number[] = [];
  for (let i = 1; i <= count; i++) years.push(i * lifetime);

  return {
    count,
    years,
    remainingLife: lifetime * (1 + count) - horizon,
  };
}

/**
 * Net present value breakdown of an asset held over the project horizon.
 *
 * Investment is paid at year 0, O&M and fuel every year 1..N, replacements at
 * multiples of `lifetime`, and the unused share of the last unit is credited
 * (prorated salvage) at year N.
 */
export function computeAnnuity(horizon: Horizon, inputs: AnnuityInputs): ComponentCosts {
  validateAnnuity(horizon, inputs);
  return annuityCosts(horizon, inputs);
}

function validateAnnuity(horizon: Horizon, inputs: AnnuityInputs) {
  validateHorizon("Annuity", "lifetime horizon", horizon.lifetime);
  validateDiscountRate("Annuity", "discountRate", horizon.discountRate);
  nonNegative("Annuity", "quantity", inputs.quantity);
  nonNegative("Annuity", "investmentPrice", inputs.investmentPrice);
  nonNegative("Annuity", "replacementPrice", inputs.replacementPrice);
  nonNegative("Annuity", "salvagePrice", inputs.salvagePrice);
  nonNegative("Annuity", "omPrice", inputs.omPrice);
  positive("Annuity", "lifetime", inputs.lifetime);

  nonNegative("Annuity", "fuelConsumption", inputs.fuelConsumption ?? 0);
  nonNegative("Annuity", "fuelPrice", inputs.fuelPrice ?? 0);
}

/**
 * computeAnnuity without the input guards, for callers that validated the
 * component and project already.
 */
export function annuityCosts(horizon: Horizon, inputs: AnnuityInputs): ComponentCosts {
  const fuelConsumption = inputs.fuelConsumption ?? 0;
  const fuelPrice = inputs.fuelPrice ?? 0;

  const N = horizon.lifetime;
  const r = horizon.discountRate;
  const { quantity, lifetime } = inputs;

  const df = discountFactors(r, N);
  const sumDiscounts = sum(df);

  const schedule = replacementSchedule(N, lifetime);
  const salvagePriceEffective = (inputs.salvagePrice * schedule.remainingLife) / lifetime;

  const investment = inputs.investmentPrice * quantity;
  const om = inputs.omPrice * quantity * sumDiscounts;
  const replacement =
    schedule.count === 0
      ? 0
      : inputs.replacementPrice * quantity * sum(schedule.years.map((y) => discountFactor(r, y)));
  const salvage = 0 - salvagePriceEffective * quantity * df[N - 1];
  const fuel = fuelConsumption > 0 ? fuelPrice * fuelConsumption * sumDiscounts : 0;

  return componentCosts({ investment, replacement, om, fuel, salvage });
}
