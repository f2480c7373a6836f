// src/types.ts

//
// ------------------------------------------------------------
//  Cost records shared by Annuity, Adapters, Economics
// ------------------------------------------------------------
//

/**
 * Present values of one component's cost factors over the project horizon.
 * Salvage is a credit and is stored negative, so
 * total = investment + replacement + om + fuel + salvage.
 */
export interface ComponentCosts {
  readonly total: number;
  readonly investment: number;
  readonly replacement: number;
  readonly om: number;
  readonly fuel: number;
  readonly salvage: number;
}

// Capability tag declared by each non-dispatchable source
export type SourceFamily = "photovoltaic" | "wind" | "other";

export type CostCategory = "generator" | "battery" | SourceFamily;

export const COST_CATEGORIES: readonly CostCategory[] = [
  "generator",
  "battery",
  "photovoltaic",
  "wind",
  "other",
];

export interface MicrogridCosts {
  /** Levelized cost of energy (currency/kWh) */
  lcoe: number;
  /** Annualized cost of energy (currency/kWh) */
  coe: number;
  /** Net present cost */
  npc: number;
  /** npc × capital recovery factor */
  annualizedCost: number;
  crf: number;
  /** Served energy over the horizon, discounted from year 2 on */
  lifetimeServedEnergy: number;
  currency: string;

  // project-level present values, summed over all categories
  investment: number;
  replacement: number;
  om: number;
  fuel: number;
  salvage: number;

  categories: Record<CostCategory, ComponentCosts>;
}

// ---------------------------
//  Operation statistics
// ---------------------------

/**
 * Yearly summary of the dispatch simulation (produced outside this library).
 * Only servedEnergy, genHours, genFuel and storageCycles drive the costs.
 */
export interface OperationStats {
  servedEnergy: number;         // kWh/y
  genHours: number;             // h/y
  genFuel: number;              // L/y
  storageCycles: number;        // equivalent full cycles per year

  shedEnergy?: number;          // kWh/y
  shedMax?: number;             // kW
  shedHours?: number;           // h/y
  shedDuration?: number;        // h, longest outage
  shedRate?: number;            // 0..1
  genEnergy?: number;           // kWh/y
  storageChargeEnergy?: number;     // kWh/y
  storageDischargeEnergy?: number;  // kWh/y
  spilledEnergy?: number;       // kWh/y
  spilledMax?: number;          // kW
  spilledRate?: number;         // 0..1
  renewableRate?: number;       // 0..1
}

// ---------------------------------------------------------------------------
// Env passed into the aggregator (logger only for now)
// ---------------------------------------------------------------------------

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

export interface EconomicsEnv {
  logger?: Logger;
}
