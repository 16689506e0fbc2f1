import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const SHELL_GROUP = namedGroup("shell");

export const SHELL_ERRORS: Readonly<Record<string, string>> = tables.shell;

registerGroupErrors(SHELL_GROUP, createTableResolver(SHELL_GROUP, SHELL_ERRORS));
