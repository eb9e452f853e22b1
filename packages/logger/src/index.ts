export * from "./interface.js";
export {getEmptyLogger} from "./empty.js";
