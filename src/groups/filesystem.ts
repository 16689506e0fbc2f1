/**
 * File system group errors.
 *
 * "Mount point not found" (14) usually means the path prefix does not
 * match the mount points of the target firmware.
 */
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const FILESYSTEM_GROUP = namedGroup("filesystem");

export const FILESYSTEM_ERRORS: Readonly<Record<string, string>> = tables.filesystem;

registerGroupErrors(FILESYSTEM_GROUP, createTableResolver(FILESYSTEM_GROUP, FILESYSTEM_ERRORS));
