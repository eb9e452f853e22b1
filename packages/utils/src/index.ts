export * from "./assert.js";
export * from "./bytes.js";
export * from "./command.js";
export * from "./errors.js";
export * from "./json.js";
export * from "./logger.js";
export * from "./math.js";
export * from "./objects.js";
