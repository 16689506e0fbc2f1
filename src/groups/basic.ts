// Zephyr basic group (63) errors.
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const BASIC_GROUP = namedGroup("basic");

export const BASIC_ERRORS: Readonly<Record<string, string>> = tables.basic;

registerGroupErrors(BASIC_GROUP, createTableResolver(BASIC_GROUP, BASIC_ERRORS));
