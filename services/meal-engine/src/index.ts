export * from "./types.js";
export * from "./errors.js";
export * from "./rounding.js";
export * from "./categorizer.js";
export * from "./preference-filter.js";
export * from "./seeded-random.js";
export * from "./planner.js";
export * from "./plan-parser.js";
export * from "./day-count.js";
export * from "./nutrition.js";
export * from "./shopping-list.js";
export * from "./generation.js";
