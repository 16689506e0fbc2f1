// Statistics group errors.
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const STATS_GROUP = namedGroup("stats");

export const STATS_ERRORS: Readonly<Record<string, string>> = tables.stats;

registerGroupErrors(STATS_GROUP, createTableResolver(STATS_GROUP, STATS_ERRORS));
