/**
 * Image management group errors (slot handling, upload and TLV
 * validation). Code 27 is what a device answers when asked to downgrade.
 */
import { createTableResolver, registerGroupErrors } from "../errorRegistry.ts";
import { namedGroup } from "../groups.ts";
import tables from "./errorTables.json";

export const IMAGE_GROUP = namedGroup("image");

export const IMAGE_ERRORS: Readonly<Record<string, string>> = tables.image;

registerGroupErrors(IMAGE_GROUP, createTableResolver(IMAGE_GROUP, IMAGE_ERRORS));
