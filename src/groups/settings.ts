// Settings (system configuration) group errors.
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const SETTINGS_GROUP = namedGroup("settings");

export const SETTINGS_ERRORS: Readonly<Record<string, string>> = tables.settings;

registerGroupErrors(SETTINGS_GROUP, createTableResolver(SETTINGS_GROUP, SETTINGS_ERRORS));
