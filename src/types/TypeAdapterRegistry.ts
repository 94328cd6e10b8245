/**
 * sqlweave Type Adapter Registry
 *
 * Process-wide map from (host type, column representation) to adapter.
 * Lookups read a frozen snapshot; registration builds a new snapshot and
 * swaps it in, so readers never observe a half-applied update.
 */

import type { Dialect } from "../dialect/Dialect";
import { UnregisteredTypeError } from "../errors/OrmErrors";
import { BUILTIN_ADAPTERS } from "./BuiltinAdapters";
import {
  AdapterOptions,
  ConversionDirection,
  DbType,
  HostType,
  NATIVE_HOST_TYPES,
  TypeAdapter,
  inferHostType,
} from "./TypeAdapter";

export interface AdapterOverride {
  readonly adapter?: TypeAdapter;
  readonly dbType?: DbType;
}

export interface ResolveOptions {
  readonly dialect?: Dialect;
  readonly override?: AdapterOverride;
  readonly options?: AdapterOptions;
}

/**
 * An adapter bound to a direction and a column representation
 */
export interface ResolvedAdapter {
  /** Undefined for native pass-through */
  readonly adapter: TypeAdapter | undefined;
  readonly dbType: DbType;
  convert(value: unknown): unknown;
}

interface RegistryState {
  readonly byKey: ReadonlyMap<string, TypeAdapter>;
  /** Preferred adapter per host type (last registered wins) */
  readonly byHost: ReadonlyMap<HostType, TypeAdapter>;
  /** Adapters with a detect() hook, most recent first */
  readonly detectors: readonly TypeAdapter[];
}

const keyOf = (hostType: HostType, dbType: DbType): string => `${hostType}:${dbType}`;

const identity = (value: unknown): unknown => value;

export class TypeAdapterRegistry {
  private state: RegistryState = Object.freeze({
    byKey: new Map<string, TypeAdapter>(),
    byHost: new Map<HostType, TypeAdapter>(),
    detectors: [],
  });

  /**
   * A registry preloaded with the built-in adapters
   */
  static withBuiltins(): TypeAdapterRegistry {
    const registry = new TypeAdapterRegistry();
    BUILTIN_ADAPTERS.forEach((adapter) => registry.register(adapter));
    return registry;
  }

  /**
   * Register an adapter for every representation it supports. Replaces any
   * adapter already registered for the same pairs; queries compiled earlier
   * pick up the change when they are next bound.
   */
  register(adapter: TypeAdapter): this {
    const current = this.state;
    const byKey = new Map(current.byKey);
    for (const dbType of adapter.dbTypes) {
      byKey.set(keyOf(adapter.hostType, dbType), adapter);
    }
    const byHost = new Map(current.byHost).set(adapter.hostType, adapter);
    const detectors = adapter.detect
      ? [adapter, ...current.detectors.filter((d) => d.hostType !== adapter.hostType)]
      : current.detectors;

    this.state = Object.freeze({ byKey, byHost, detectors: Object.freeze(detectors) });
    return this;
  }

  /**
   * Remove the adapter for a host type, or only one of its representations
   */
  unregister(hostType: HostType, dbType?: DbType): this {
    const current = this.state;
    const byKey = new Map(current.byKey);
    for (const key of current.byKey.keys()) {
      if (dbType ? key === keyOf(hostType, dbType) : key.startsWith(`${hostType}:`)) {
        byKey.delete(key);
      }
    }
    const byHost = new Map(current.byHost);
    const detectors = dbType
      ? current.detectors
      : current.detectors.filter((d) => d.hostType !== hostType);
    if (!dbType) byHost.delete(hostType);

    this.state = Object.freeze({ byKey, byHost, detectors: Object.freeze(detectors) });
    return this;
  }

  get(hostType: HostType, dbType: DbType): TypeAdapter | undefined {
    return this.state.byKey.get(keyOf(hostType, dbType));
  }

  has(hostType: HostType, dbType?: DbType): boolean {
    return dbType
      ? this.state.byKey.has(keyOf(hostType, dbType))
      : this.state.byHost.has(hostType);
  }

  adapters(): TypeAdapter[] {
    return [...new Set(this.state.byKey.values())];
  }

  /**
   * Host type of a value: custom detectors first, then the built-in rules
   */
  detectHostType(value: unknown): HostType {
    const detector = this.state.detectors.find((adapter) => adapter.detect?.(value));
    return detector ? detector.hostType : inferHostType(value);
  }

  /**
   * Resolve the conversion for a host type.
   *
   * Precedence: explicit override, then the dialect's suggested
   * representation, then the adapter's own preference. Anything else is an
   * UnregisteredTypeError.
   */
  resolve(
    hostType: HostType,
    direction: ConversionDirection,
    { dialect, override, options }: ResolveOptions = {}
  ): ResolvedAdapter {
    const state = this.state;

    if (override?.adapter) {
      const adapter = override.adapter;
      const dbType = override.dbType ?? adapter.dbTypes[0];
      if (dbType === "native") return { adapter: undefined, dbType, convert: identity };
      if (!adapter.dbTypes.includes(dbType)) {
        throw new UnregisteredTypeError(`${hostType} (${adapter.name})`, dbType);
      }
      return this.bind(adapter, dbType, direction, options);
    }

    const suggested = override?.dbType ?? dialect?.suggestDbType(hostType);
    if (suggested === "native") {
      return { adapter: undefined, dbType: "native", convert: identity };
    }

    if (suggested !== undefined) {
      const adapter = state.byKey.get(keyOf(hostType, suggested));
      if (!adapter) {
        if (NATIVE_HOST_TYPES.has(hostType) && override?.dbType === undefined) {
          return { adapter: undefined, dbType: "native", convert: identity };
        }
        throw new UnregisteredTypeError(hostType, suggested);
      }
      return this.bind(adapter, suggested, direction, options);
    }

    if (NATIVE_HOST_TYPES.has(hostType)) {
      return { adapter: undefined, dbType: "native", convert: identity };
    }

    const preferred = state.byHost.get(hostType);
    if (!preferred) throw new UnregisteredTypeError(hostType);
    return this.bind(preferred, preferred.dbTypes[0], direction, options);
  }

  private bind(
    adapter: TypeAdapter,
    dbType: DbType,
    direction: ConversionDirection,
    options: AdapterOptions | undefined
  ): ResolvedAdapter {
    const convert =
      direction === "toDatabase"
        ? (value: unknown) => adapter.toDatabase(value, dbType, options)
        : (value: unknown) => adapter.fromDatabase(value, dbType, options);
    return { adapter, dbType, convert };
  }
}

// ============================================================================
// Process-wide default
// ============================================================================

let defaultRegistry: TypeAdapterRegistry | null = null;

/**
 * Get the shared registry, created with the built-in adapters on first use
 */
export function getTypeRegistry(): TypeAdapterRegistry {
  if (!defaultRegistry) {
    defaultRegistry = TypeAdapterRegistry.withBuiltins();
  }
  return defaultRegistry;
}

/**
 * Reset the shared registry (for tests)
 */
export function resetTypeRegistry(): void {
  defaultRegistry = null;
}
