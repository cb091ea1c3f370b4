export * from "./hosts.js";
export * from "./accelerators.js";
export * from "./pools.js";
export * from "./api.js";
