/**
 * Converts compiled bindings into driver values at execution time
 */

import type { Binding } from "../compiler/ParameterCollector";
import type { Dialect } from "../dialect/Dialect";
import { NATIVE_HOST_TYPES } from "./TypeAdapter";
import { TypeAdapterRegistry, getTypeRegistry } from "./TypeAdapterRegistry";

export function bindValue(
  binding: Binding,
  dialect: Dialect,
  registry: TypeAdapterRegistry = getTypeRegistry()
): unknown {
  const { value } = binding;
  if (value === null || value === undefined) return null;

  const hostType =
    binding.hostType === "unknown" ? registry.detectHostType(value) : binding.hostType;
  const overridden = binding.adapter !== undefined || binding.dbType !== undefined;
  if (!overridden && NATIVE_HOST_TYPES.has(hostType)) return value;

  return registry
    .resolve(hostType, "toDatabase", {
      dialect,
      override: { adapter: binding.adapter, dbType: binding.dbType },
    })
    .convert(value);
}

/**
 * Driver-ready parameter list for a compiled query
 */
export function bindParameters(
  compiled: { readonly bindings: readonly Binding[] },
  dialect: Dialect,
  registry: TypeAdapterRegistry = getTypeRegistry()
): unknown[] {
  return compiled.bindings.map((binding) => bindValue(binding, dialect, registry));
}
