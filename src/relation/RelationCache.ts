/**
 * sqlweave Relation Cache
 *
 * Loaded relation values live beside the record, not inside it: a WeakMap
 * keyed by the record object holds one entry per slot, and the record gets
 * a getter for each slot that reads from here. An expired entry reads as
 * not loaded.
 */

export type RelationState = "loaded" | "not_loaded";

interface CacheEntry {
  readonly value: unknown;
  /** Epoch ms, undefined means no expiry */
  readonly expiresAt: number | undefined;
}

export interface AttachOptions {
  /** Lifetime in ms; zero or undefined keeps the value until cleared */
  readonly ttlMs?: number;
  /** Enumerable slots show up in spreads and JSON; inverse slots are not */
  readonly enumerable?: boolean;
}

const entries = new WeakMap<object, Map<string, CacheEntry>>();

let clock: () => number = Date.now;

/**
 * Replace the time source (for tests)
 */
export function setRelationClock(now: () => number): void {
  clock = now;
}

export function resetRelationClock(): void {
  clock = Date.now;
}

function liveEntry(record: object, slot: string): CacheEntry | undefined {
  const slots = entries.get(record);
  const entry = slots?.get(slot);
  if (!entry) return undefined;
  if (entry.expiresAt !== undefined && clock() >= entry.expiresAt) {
    slots?.delete(slot);
    return undefined;
  }
  return entry;
}

/**
 * Store a loaded value and expose it as `record[slot]`
 */
export function attachRelation(
  record: object,
  slot: string,
  value: unknown,
  { ttlMs, enumerable = true }: AttachOptions = {}
): void {
  let slots = entries.get(record);
  if (!slots) {
    slots = new Map();
    entries.set(record, slots);
  }
  slots.set(slot, {
    value,
    expiresAt: ttlMs ? clock() + ttlMs : undefined,
  });

  const descriptor = Object.getOwnPropertyDescriptor(record, slot);
  if (!descriptor || descriptor.get === undefined) {
    Object.defineProperty(record, slot, {
      configurable: true,
      enumerable,
      get: () => liveEntry(record, slot)?.value,
    });
  }
}

export function relationState(record: object, slot: string): RelationState {
  return liveEntry(record, slot) ? "loaded" : "not_loaded";
}

/**
 * Cached value, or undefined when the slot is not loaded
 */
export function cachedRelation(record: object, slot: string): unknown {
  return liveEntry(record, slot)?.value;
}

export function hasCachedRelation(record: object, slot: string): boolean {
  return liveEntry(record, slot) !== undefined;
}

/**
 * Mark one slot, or every slot, as not loaded
 */
export function clearRelation(record: object, slot?: string): void {
  const slots = entries.get(record);
  if (!slots) return;
  if (slot === undefined) {
    slots.clear();
  } else {
    slots.delete(slot);
  }
}
