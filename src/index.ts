export const VERSION = "0.1.0";

export * as annuity from "./annuity/annuity";
export * as adapters from "./adapters";
export * as discount from "./utils/discount";
export * as validation from "./validation/validate";
export * from "./types";
export * from "./errors";
export { economics, lifetimeServedEnergy } from "./economics/economics";

export * as capabilities from "./capabilities";
export * as config from "./config";
