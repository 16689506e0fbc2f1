/**
 * Resolution of return codes into structured errors.
 *
 * Group-scoped codes are looked up in a registry populated by each group
 * module (see `src/groups/`), so this module has no knowledge of any
 * particular group's error set.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
} from "option-t/plain_result";
import {
  GroupReturnCodeError,
  ReturnCodeError,
  type SmpError,
} from "./errors.ts";
import { groupToValue, type SmpGroup, toGroupValue } from "./groups.ts";
import { isSuccessCode } from "./returnCodes.ts";
import type { SmpResponse } from "./smp.ts";

/** Maps a group-scoped code to an error, or `undefined` if unknown. */
export type GroupErrorResolver = (rc: number) => SmpError | undefined;

const resolvers = new Map<number, GroupErrorResolver>();

/** Register (or overwrite) the error resolver for a group. */
export function registerGroupErrors(
  group: SmpGroup | number,
  resolver: GroupErrorResolver,
): void {
  resolvers.set(toGroupValue(group), resolver);
}

export function unregisterGroupErrors(group: SmpGroup | number): boolean {
  return resolvers.delete(toGroupValue(group));
}

/** Group ids with a registered resolver, ascending. */
export function getRegisteredGroups(): number[] {
  return Array.from(resolvers.keys()).sort((a, b) => a - b);
}

/**
 * Resolver backed by a code → reason table, as loaded from the built-in
 * error tables.
 */
export function createTableResolver(
  group: SmpGroup | number,
  table: Readonly<Record<string, string>>,
): GroupErrorResolver {
  const groupValue = toGroupValue(group);
  return (rc) => {
    const reason = table[String(rc)];
    return reason === undefined
      ? undefined
      : new GroupReturnCodeError(groupValue, rc, reason);
  };
}

/** Resolve a protocol-level code: 0 is success, anything else an error. */
export function resolveReturnCode(
  code: number,
): Result<void, ReturnCodeError> {
  return isSuccessCode(code)
    ? createOk(undefined)
    : createErr(new ReturnCodeError(code));
}

/**
 * Resolve a group-scoped code. Unknown groups, and codes missing from a
 * group's table, fall back to the generic {@link ReturnCodeError}.
 */
export function resolveGroupReturnCode(
  group: SmpGroup | number,
  rc: number,
): Result<void, SmpError> {
  if (isSuccessCode(rc)) return createOk(undefined);
  // Out-of-range ids from the wire simply miss the registry.
  const resolver = resolvers.get(
    typeof group === "number" ? group : groupToValue(group),
  );
  return createErr(resolver?.(rc) ?? new ReturnCodeError(rc));
}

/**
 * Check the return codes carried by a decoded response. The SMPv2 group
 * error takes precedence over the SMPv1 `rc` value.
 */
export function checkResponse(
  response: SmpResponse,
): Result<SmpResponse, SmpError> {
  const { groupReturnCode } = response;
  const status: Result<void, SmpError> =
    groupReturnCode && !isSuccessCode(groupReturnCode.rc)
      ? resolveGroupReturnCode(groupReturnCode.group, groupReturnCode.rc)
      : resolveReturnCode(response.returnCode);
  if (isErr(status)) return createErr(unwrapErr(status));
  return createOk(response);
}
