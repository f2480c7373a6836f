import type { Battery, DispatchableGenerator, Microgrid, NonDispatchableSource, Project } from "../config";
import { InvalidConfigurationError } from "../errors";
import type { OperationStats } from "../types";

/**
 * Guards used at the Annuity / Economics boundary.
 * `scope` prefixes messages with the raising module ("Annuity", "Economics").
 */

function fail(scope: string, field: string, rule: string, value: unknown): never {
  throw new InvalidConfigurationError(field, `${scope}: ${field} ${rule} (got ${String(value)})`);
}

function finite(scope: string, field: string, v: number) {
  if (typeof v !== "number" || !Number.isFinite(v)) fail(scope, field, "must be a finite number", v);
}

export function nonNegative(scope: string, field: string, v: number) {
  finite(scope, field, v);
  if (v < 0) fail(scope, field, "must be >= 0", v);
}

export function positive(scope: string, field: string, v: number) {
  finite(scope, field, v);
  if (v <= 0) fail(scope, field, "must be > 0", v);
}

export function validateHorizon(scope: string, field: string, lifetime: number) {
  if (!Number.isInteger(lifetime) || lifetime <= 0) fail(scope, field, "must be a positive integer", lifetime);
}

export function validateDiscountRate(scope: string, field: string, rate: number) {
  finite(scope, field, rate);
  if (rate <= -1) fail(scope, field, "must be > -1", rate);
}

export function validateProject(scope: string, p: Project, path = "project") {
  validateHorizon(scope, `${path}.lifetime`, p.lifetime);
  validateDiscountRate(scope, `${path}.discountRate`, p.discountRate);
  positive(scope, `${path}.timestep`, p.timestep);
}

function validateRatios(scope: string, path: string, r: { replacementPriceRatio: number; salvagePriceRatio: number }) {
  nonNegative(scope, `${path}.replacementPriceRatio`, r.replacementPriceRatio);
  nonNegative(scope, `${path}.salvagePriceRatio`, r.salvagePriceRatio);
}

export function validateSource(scope: string, src: NonDispatchableSource, path: string) {
  validateRatios(scope, path, src);
  nonNegative(scope, `${path}.powerRated`, src.powerRated);

  if (src.type === "pv-inverter") {
    nonNegative(scope, `${path}.ilr`, src.ilr);
    nonNegative(scope, `${path}.investmentPriceAc`, src.investmentPriceAc);
    nonNegative(scope, `${path}.omPriceAc`, src.omPriceAc);
    positive(scope, `${path}.lifetimeAc`, src.lifetimeAc);
    nonNegative(scope, `${path}.investmentPriceDc`, src.investmentPriceDc);
    nonNegative(scope, `${path}.omPriceDc`, src.omPriceDc);
    positive(scope, `${path}.lifetimeDc`, src.lifetimeDc);
    return;
  }

  nonNegative(scope, `${path}.investmentPrice`, src.investmentPrice);
  nonNegative(scope, `${path}.omPrice`, src.omPrice);
  positive(scope, `${path}.lifetime`, src.lifetime);
}

export function validateGenerator(scope: string, gen: DispatchableGenerator, path = "generator") {
  validateRatios(scope, path, gen);
  nonNegative(scope, `${path}.powerRated`, gen.powerRated);
  nonNegative(scope, `${path}.investmentPrice`, gen.investmentPrice);
  nonNegative(scope, `${path}.omPriceHours`, gen.omPriceHours);
  positive(scope, `${path}.lifetimeHours`, gen.lifetimeHours);
  nonNegative(scope, `${path}.fuelPrice`, gen.fuelPrice);
}

export function validateBattery(scope: string, bt: Battery, path = "storage") {
  validateRatios(scope, path, bt);
  nonNegative(scope, `${path}.energyRated`, bt.energyRated);
  nonNegative(scope, `${path}.investmentPrice`, bt.investmentPrice);
  nonNegative(scope, `${path}.omPrice`, bt.omPrice);
  positive(scope, `${path}.lifetimeCalendar`, bt.lifetimeCalendar);
  positive(scope, `${path}.lifetimeCycles`, bt.lifetimeCycles);
}

export function validateOperationStats(scope: string, stats: OperationStats, path = "operStats") {
  nonNegative(scope, `${path}.servedEnergy`, stats.servedEnergy);
  nonNegative(scope, `${path}.genHours`, stats.genHours);
  nonNegative(scope, `${path}.genFuel`, stats.genFuel);
  nonNegative(scope, `${path}.storageCycles`, stats.storageCycles);
}

export function validateMicrogrid(scope: string, mg: Microgrid) {
  validateProject(scope, mg.project);
  if (mg.generator) validateGenerator(scope, mg.generator);
  if (mg.storage) validateBattery(scope, mg.storage);
  mg.nondispatchables.forEach((src, i) => validateSource(scope, src, `nondispatchables[${i}]`));
}
