// src/config.ts

import type { SourceFamily } from "./types";

// ---- Defaults ----

export const DEFAULT_REPLACEMENT_PRICE_RATIO = 1.0;
export const DEFAULT_SALVAGE_PRICE_RATIO = 1.0;
export const DEFAULT_ILR = 1.0;
export const DEFAULT_TIMESTEP_HOURS = 1.0;
export const DEFAULT_CURRENCY = "€";

// ---- Project ----

export interface Project {
  lifetime: number;       // horizon, whole years
  discountRate: number;   // fraction per year, > -1
  timestep: number;       // h
  currency: string;
}

// ---- Shared price ratios ----

export interface PriceRatios {
  /** replacement price = investment price × ratio */
  replacementPriceRatio: number;
  /** salvage price = investment price × ratio, prorated by remaining life */
  salvagePriceRatio: number;
}

// ---- Non-dispatchable sources ----

/**
 * Single price/lifetime set: photovoltaic without separate inverter, wind turbine...
 */
export interface SimpleSource extends PriceRatios {
  type: "simple";
  family: SourceFamily;
  powerRated: number;       // kW
  investmentPrice: number;  // currency/kW
  omPrice: number;          // currency/kW/y
  lifetime: number;         // y
}

/**
 * PV with its AC inverter costed apart from the DC panels.
 * DC rating is powerRated × ilr.
 */
export interface PVInverter extends PriceRatios {
  type: "pv-inverter";
  family: SourceFamily;
  powerRated: number;         // kW AC
  ilr: number;                // inverter loading ratio DC/AC
  investmentPriceAc: number;  // currency/kW AC
  omPriceAc: number;          // currency/kW AC/y
  lifetimeAc: number;         // y
  investmentPriceDc: number;  // currency/kW DC
  omPriceDc: number;          // currency/kW DC/y
  lifetimeDc: number;         // y
}

export type NonDispatchableSource = SimpleSource | PVInverter;

// ---- Generator ----

export interface DispatchableGenerator extends PriceRatios {
  powerRated: number;       // kW
  investmentPrice: number;  // currency/kW
  omPriceHours: number;     // currency/kW/h of operation
  lifetimeHours: number;    // h
  fuelPrice: number;        // currency/L
}

// ---- Battery ----

export interface Battery extends PriceRatios {
  energyRated: number;        // kWh
  investmentPrice: number;    // currency/kWh
  omPrice: number;            // currency/kWh/y
  lifetimeCalendar: number;   // y
  lifetimeCycles: number;     // equivalent full cycles
}

// ---- Top-level microgrid config ----

export interface Microgrid {
  project: Project;
  generator?: DispatchableGenerator;
  storage?: Battery;
  nondispatchables: NonDispatchableSource[];
}

// ---------------------------------------------------------------------------
// Factories: apply the defaults above and set the capability tag
// ---------------------------------------------------------------------------

type WithOptionalRatios<T> = Omit<T, keyof PriceRatios> & Partial<PriceRatios>;

function ratios(input: Partial<PriceRatios>): PriceRatios {
  return {
    replacementPriceRatio: input.replacementPriceRatio ?? DEFAULT_REPLACEMENT_PRICE_RATIO,
    salvagePriceRatio: input.salvagePriceRatio ?? DEFAULT_SALVAGE_PRICE_RATIO,
  };
}

export function project(
  lifetime: number,
  discountRate: number,
  timestep: number = DEFAULT_TIMESTEP_HOURS,
  currency: string = DEFAULT_CURRENCY
): Project {
  return { lifetime, discountRate, timestep, currency };
}

export type SimpleSourceInput = WithOptionalRatios<Omit<SimpleSource, "type" | "family">>;

export function nonDispatchable(
  input: SimpleSourceInput,
  family: SourceFamily = "other"
): SimpleSource {
  return { ...input, ...ratios(input), type: "simple", family };
}

export function photovoltaic(input: SimpleSourceInput): SimpleSource {
  return nonDispatchable(input, "photovoltaic");
}

export function windPower(input: SimpleSourceInput): SimpleSource {
  return nonDispatchable(input, "wind");
}

export type PVInverterInput = WithOptionalRatios<Omit<PVInverter, "type" | "family" | "ilr">> & {
  ilr?: number;
};

export function pvInverter(input: PVInverterInput): PVInverter {
  return {
    ...input,
    ...ratios(input),
    ilr: input.ilr ?? DEFAULT_ILR,
    type: "pv-inverter",
    family: "photovoltaic",
  };
}

export function dieselGenerator(input: WithOptionalRatios<DispatchableGenerator>): DispatchableGenerator {
  return { ...input, ...ratios(input) };
}

export function battery(input: WithOptionalRatios<Battery>): Battery {
  return { ...input, ...ratios(input) };
}
