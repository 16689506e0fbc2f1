// Built-in group error tables. Importing this module registers them with
// the error registry.

import "./basic.ts";
import "./filesystem.ts";
import "./image.ts";
import "./os.ts";
import "./settings.ts";
import "./shell.ts";
import "./stats.ts";

export { BASIC_ERRORS, BASIC_GROUP } from "./basic.ts";
export { FILESYSTEM_ERRORS, FILESYSTEM_GROUP } from "./filesystem.ts";
export { IMAGE_ERRORS, IMAGE_GROUP } from "./image.ts";
export { OS_ERRORS, OS_GROUP } from "./os.ts";
export { SETTINGS_ERRORS, SETTINGS_GROUP } from "./settings.ts";
export { SHELL_ERRORS, SHELL_GROUP } from "./shell.ts";
export { STATS_ERRORS, STATS_GROUP } from "./stats.ts";
