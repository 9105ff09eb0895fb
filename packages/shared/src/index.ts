export * from "./devices.js";
export * from "./units.js";
export * from "./jobs.js";
export * from "./builders.js";
export * from "./events.js";
export * from "./api.js";
