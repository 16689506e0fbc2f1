// OS (default) group errors.
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const OS_GROUP = namedGroup("os");

export const OS_ERRORS: Readonly<Record<string, string>> = tables.os;

registerGroupErrors(OS_GROUP, createTableResolver(OS_GROUP, OS_ERRORS));
