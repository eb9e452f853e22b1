export * from "./committee.js";
export * from "./epoch.js";
export * from "./epochShuffling.js";
export * from "./seed.js";
export * from "./shuffle.js";
export * from "./validator.js";
