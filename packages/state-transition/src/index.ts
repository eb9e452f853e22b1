export * from "./errors.js";
export * from "./lightState.js";
export * from "./randaoMixes.js";
export * from "./verify.js";
export * from "./util/index.js";
