export * from "./types.js";
export * as ssz from "./sszTypes.js";
export * from "./errors.js";
export * from "./payloads.js";
