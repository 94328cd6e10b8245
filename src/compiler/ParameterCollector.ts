/**
 * Collects bound values in placeholder order while a statement renders
 */

import type { Dialect } from "../dialect/Dialect";
import type { DbType, HostType, TypeAdapter } from "../types/TypeAdapter";
import { inferHostType } from "../types/TypeAdapter";

/**
 * A value waiting to be converted for the driver. Adapters are resolved at
 * bind time, so a binding only records the hints.
 */
export interface Binding {
  readonly value: unknown;
  readonly hostType: HostType;
  readonly dbType?: DbType;
  readonly adapter?: TypeAdapter;
}

export class ParameterCollector {
  private readonly entries: Binding[] = [];

  constructor(private readonly dialect: Dialect) {}

  /**
   * Record a binding and return its placeholder. Equal values are not
   * merged: each occurrence gets its own placeholder and entry.
   */
  add(binding: Binding): string {
    this.entries.push(Object.freeze({ ...binding }));
    return this.dialect.placeholder(this.entries.length);
  }

  addValue(value: unknown): string {
    return this.add({ value, hostType: inferHostType(value) });
  }

  get size(): number {
    return this.entries.length;
  }

  bindings(): readonly Binding[] {
    return Object.freeze([...this.entries]);
  }

  values(): unknown[] {
    return this.entries.map((entry) => entry.value);
  }
}
