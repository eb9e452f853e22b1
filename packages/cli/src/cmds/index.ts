import {committee} from "./committee/index.js";
import {replay} from "./replay/index.js";

export const cmds = [replay, committee];
