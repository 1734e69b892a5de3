// Barrel re-export of the domain types
export * from "./entity.js";
export * from "./policy.js";
export * from "./operations.js";
export * from "./repository.js";
export * from "./hooks.js";
export * from "./run.js";
