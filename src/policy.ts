import ms from "ms";
import { ExclusionKind, Exclusions, ResourceDescriptor } from "./types";

const DAY_MS = ms("1d");
const MIN_ABBREVIATED_ID = 12;

export type NameMatch = "exact" | "substring";

export type Decision = { action: "act" } | { action: "skip"; reason: "excluded" | "too-recent" };

function stripDigestPrefix(id: string): string {
  return id.startsWith("sha256:") ? id.slice("sha256:".length) : id;
}

function isDigest(id: string): boolean {
  return id.startsWith("sha256:");
}

function isHex(value: string): boolean {
  return /^[0-9a-f]+$/.test(value);
}

/**
 * Docker prints the same image under a 12 character id, a full 64
 * character digest, or `sha256:<digest>` depending on the command.
 * Abbreviations only count against a `sha256:` digest; every other id
 * (volume, builder and cluster names) must match exactly.
 */
export function sameResourceId(id: string, pattern: string): boolean {
  if (id === pattern) return true;
  if (!isDigest(id) && !isDigest(pattern)) return false;
  const a = stripDigestPrefix(id);
  const b = stripDigestPrefix(pattern);
  if (a === b) return a !== "";
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  return shorter.length >= MIN_ABBREVIATED_ID && isHex(shorter) && isHex(longer) && longer.startsWith(shorter);
}

export class ResourceKey {
  constructor(
    readonly id: string,
    readonly displayName: string,
    readonly nameMatch: NameMatch = "exact"
  ) {}

  static of(resource: ResourceDescriptor, nameMatch: NameMatch = "exact"): ResourceKey {
    return new ResourceKey(resource.id, resource.displayName, nameMatch);
  }

  matches(pattern: string): boolean {
    if (pattern === "") return false;
    if (sameResourceId(this.id, pattern)) return true;
    if (this.displayName === "") return false;
    return this.nameMatch === "substring" ? this.displayName.includes(pattern) : this.displayName === pattern;
  }

  matchesAny(patterns: Iterable<string>): boolean {
    for (const pattern of patterns) {
      if (this.matches(pattern)) return true;
    }
    return false;
  }

  /** `id (name)`, or just the id when there is no distinct name. */
  label(): string {
    return this.displayName && this.displayName !== this.id ? `${this.id} (${this.displayName})` : this.id;
  }
}

/** Whole days since `createdAt`, or undefined when the timestamp is missing or unparseable. */
export function ageInDays(createdAt: string | undefined, now: number): number | undefined {
  if (!createdAt) return undefined;
  const created = Date.parse(createdAt);
  if (Number.isNaN(created)) return undefined;
  return Math.floor((now - created) / DAY_MS);
}

export function isOldEnough(createdAt: string | undefined, olderThanDays: number | undefined, now: number): boolean {
  if (olderThanDays === undefined) return true;
  const age = ageInDays(createdAt, now);
  // Unknown age counts as old enough.
  if (age === undefined) return true;
  return age > olderThanDays;
}

export function decide(
  key: ResourceKey,
  exclusions: ReadonlySet<string>,
  olderThanDays: number | undefined,
  createdAt: string | undefined,
  now: number
): Decision {
  if (key.matchesAny(exclusions)) {
    return { action: "skip", reason: "excluded" };
  }
  if (!isOldEnough(createdAt, olderThanDays, now)) {
    return { action: "skip", reason: "too-recent" };
  }
  return { action: "act" };
}

const EXCLUSION_KINDS: ExclusionKind[] = ["containers", "images", "volumes", "builders", "minikube", "kind"];

export function emptyExclusions(): Exclusions {
  return buildExclusions({});
}

export function buildExclusions(entries: Partial<Record<ExclusionKind, Iterable<string>>>): Exclusions {
  const setOf = (kind: ExclusionKind): ReadonlySet<string> =>
    new Set([...(entries[kind] ?? [])].filter((entry) => entry !== ""));
  return {
    containers: setOf("containers"),
    images: setOf("images"),
    volumes: setOf("volumes"),
    builders: setOf("builders"),
    minikube: setOf("minikube"),
    kind: setOf("kind")
  };
}

export function mergeExclusions(base: Exclusions, extra: Partial<Record<ExclusionKind, Iterable<string>>>): Exclusions {
  const merged: Partial<Record<ExclusionKind, Iterable<string>>> = {};
  for (const kind of EXCLUSION_KINDS) {
    merged[kind] = [...base[kind], ...(extra[kind] ?? [])];
  }
  return buildExclusions(merged);
}
