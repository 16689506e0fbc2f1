/**
 * Command group identifiers.
 *
 * Groups partition the command id space. Well-known groups have a named
 * variant; every other 16-bit value is carried by the `custom` variant, so
 * conversion in both directions is total and lossless.
 */

/** Numeric ids of the well-known command groups. */
export const GROUP_IDS = {
  os: 0,
  image: 1,
  stats: 2,
  settings: 3,
  logs: 4,
  crash: 5,
  split: 6,
  run: 7,
  filesystem: 8,
  shell: 9,
  // Zephyr-specific groups count down from perUser.
  basic: 63,
  perUser: 64,
  suit: 66,
} as const;

export type NamedGroupKind = keyof typeof GROUP_IDS;

export type SmpGroup =
  | { readonly kind: NamedGroupKind }
  | { readonly kind: "custom"; readonly value: number };

/** Display labels for the well-known groups. */
export const GROUP_LABELS: Record<NamedGroupKind, string> = {
  basic: "Basic",
  crash: "Crash",
  filesystem: "File System",
  image: "Image",
  logs: "Logs",
  os: "OS",
  perUser: "Per-User",
  run: "Run",
  settings: "Settings",
  shell: "Shell",
  split: "Split",
  stats: "Statistics",
  suit: "SUIT",
};

const GROUPS_BY_ID = new Map<number, NamedGroupKind>();
for (const kind of Object.keys(GROUP_IDS)) {
  if (isNamedGroupKind(kind)) GROUPS_BY_ID.set(GROUP_IDS[kind], kind);
}

function assertGroupValue(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`Group id must be a 16-bit unsigned integer: ${value}`);
  }
}

export function isNamedGroupKind(kind: string): kind is NamedGroupKind {
  return Object.hasOwn(GROUP_IDS, kind);
}

/** Variant for a well-known group. */
export function namedGroup(kind: NamedGroupKind): SmpGroup {
  return { kind };
}

/**
 * Group for an arbitrary id. Ids that belong to a well-known group resolve
 * to that group's variant.
 */
export function groupFromValue(value: number): SmpGroup {
  assertGroupValue(value);
  const kind = GROUPS_BY_ID.get(value);
  return kind === undefined ? { kind: "custom", value } : { kind };
}

/** Numeric id on the wire. */
export function groupToValue(group: SmpGroup): number {
  if (group.kind === "custom") {
    assertGroupValue(group.value);
    return group.value;
  }
  return GROUP_IDS[group.kind];
}

/** Accept either representation and return the numeric id. */
export function toGroupValue(group: SmpGroup | number): number {
  return typeof group === "number"
    ? groupToValue(groupFromValue(group))
    : groupToValue(group);
}

export function groupLabel(group: SmpGroup | number): string {
  const resolved = typeof group === "number" ? groupFromValue(group) : group;
  if (resolved.kind === "custom") {
    return `Custom (${resolved.value})`;
  }
  return GROUP_LABELS[resolved.kind];
}
