/**
 * sqlweave Capability Negotiation
 *
 * Each backend declares which SQL features it supports as a map from
 * category to a bitmask of specific capabilities. The compiler consults it
 * to refuse plans the backend cannot run; test tooling consults it to pick
 * the dialects a scenario applies to.
 */

// ============================================================================
// Categories and per-category flags
// ============================================================================

export enum CapabilityCategory {
  SetOperations = "SET_OPERATIONS",
  WindowFunctions = "WINDOW_FUNCTIONS",
  AdvancedGrouping = "ADVANCED_GROUPING",
  Cte = "CTE",
  JsonOperations = "JSON_OPERATIONS",
  ReturningClause = "RETURNING_CLAUSE",
  TransactionFeatures = "TRANSACTION_FEATURES",
  BulkOperations = "BULK_OPERATIONS",
  JoinOperations = "JOIN_OPERATIONS",
}

export enum SetOperationCapability {
  Union = 1 << 0,
  UnionAll = 1 << 1,
  Intersect = 1 << 2,
  IntersectAll = 1 << 3,
  Except = 1 << 4,
  ExceptAll = 1 << 5,
}

export enum WindowFunctionCapability {
  RowNumber = 1 << 0,
  Rank = 1 << 1,
  DenseRank = 1 << 2,
  Lag = 1 << 3,
  Lead = 1 << 4,
  FirstValue = 1 << 5,
  LastValue = 1 << 6,
  NthValue = 1 << 7,
  CumeDist = 1 << 8,
  PercentRank = 1 << 9,
  Ntile = 1 << 10,
}

export enum AdvancedGroupingCapability {
  Cube = 1 << 0,
  Rollup = 1 << 1,
  GroupingSets = 1 << 2,
}

export enum CteCapability {
  Basic = 1 << 0,
  Recursive = 1 << 1,
  CompoundRecursive = 1 << 2,
  InDml = 1 << 3,
  Materialized = 1 << 4,
}

export enum JsonCapability {
  Extract = 1 << 0,
  Contains = 1 << 1,
  Exists = 1 << 2,
  Set = 1 << 3,
  Insert = 1 << 4,
  Replace = 1 << 5,
  Remove = 1 << 6,
  Keys = 1 << 7,
  Array = 1 << 8,
  Object = 1 << 9,
}

export enum ReturningCapability {
  Basic = 1 << 0,
  Expressions = 1 << 1,
  Aliases = 1 << 2,
}

export enum TransactionCapability {
  Savepoint = 1 << 0,
  IsolationLevels = 1 << 1,
  ReadOnly = 1 << 2,
}

export enum BulkOperationCapability {
  MultiRowInsert = 1 << 0,
  BatchOperations = 1 << 1,
}

export enum JoinCapability {
  Inner = 1 << 0,
  Left = 1 << 1,
  Right = 1 << 2,
  Full = 1 << 3,
  Cross = 1 << 4,
}

/**
 * Flag type accepted for each category
 */
export interface CategoryFlags {
  [CapabilityCategory.SetOperations]: SetOperationCapability;
  [CapabilityCategory.WindowFunctions]: WindowFunctionCapability;
  [CapabilityCategory.AdvancedGrouping]: AdvancedGroupingCapability;
  [CapabilityCategory.Cte]: CteCapability;
  [CapabilityCategory.JsonOperations]: JsonCapability;
  [CapabilityCategory.ReturningClause]: ReturningCapability;
  [CapabilityCategory.TransactionFeatures]: TransactionCapability;
  [CapabilityCategory.BulkOperations]: BulkOperationCapability;
  [CapabilityCategory.JoinOperations]: JoinCapability;
}

const FLAG_NAMES: { [C in CapabilityCategory]: Record<number, string> } = {
  [CapabilityCategory.SetOperations]: SetOperationCapability,
  [CapabilityCategory.WindowFunctions]: WindowFunctionCapability,
  [CapabilityCategory.AdvancedGrouping]: AdvancedGroupingCapability,
  [CapabilityCategory.Cte]: CteCapability,
  [CapabilityCategory.JsonOperations]: JsonCapability,
  [CapabilityCategory.ReturningClause]: ReturningCapability,
  [CapabilityCategory.TransactionFeatures]: TransactionCapability,
  [CapabilityCategory.BulkOperations]: BulkOperationCapability,
  [CapabilityCategory.JoinOperations]: JoinCapability,
};

/**
 * Readable name of a single flag, e.g. `CTE.Recursive`
 */
export function describeCapability<C extends CapabilityCategory>(
  category: C,
  capability: CategoryFlags[C]
): string {
  const names = FLAG_NAMES[category];
  const parts: string[] = [];
  for (let bit = 1; bit <= capability; bit <<= 1) {
    if (capability & bit) parts.push(names[bit] ?? `0x${bit.toString(16)}`);
  }
  return `${category}.${parts.join("|")}`;
}

// Common combinations
export const ALL_SET_OPERATIONS =
  SetOperationCapability.Union |
  SetOperationCapability.UnionAll |
  SetOperationCapability.Intersect |
  SetOperationCapability.IntersectAll |
  SetOperationCapability.Except |
  SetOperationCapability.ExceptAll;

export const ALL_WINDOW_FUNCTIONS =
  WindowFunctionCapability.RowNumber |
  WindowFunctionCapability.Rank |
  WindowFunctionCapability.DenseRank |
  WindowFunctionCapability.Lag |
  WindowFunctionCapability.Lead |
  WindowFunctionCapability.FirstValue |
  WindowFunctionCapability.LastValue |
  WindowFunctionCapability.NthValue |
  WindowFunctionCapability.CumeDist |
  WindowFunctionCapability.PercentRank |
  WindowFunctionCapability.Ntile;

export const ALL_JSON_OPERATIONS =
  JsonCapability.Extract |
  JsonCapability.Contains |
  JsonCapability.Exists |
  JsonCapability.Set |
  JsonCapability.Insert |
  JsonCapability.Replace |
  JsonCapability.Remove |
  JsonCapability.Keys |
  JsonCapability.Array |
  JsonCapability.Object;

export const ALL_RETURNING_FEATURES =
  ReturningCapability.Basic |
  ReturningCapability.Expressions |
  ReturningCapability.Aliases;

export const ALL_GROUPING_FEATURES =
  AdvancedGroupingCapability.Cube |
  AdvancedGroupingCapability.Rollup |
  AdvancedGroupingCapability.GroupingSets;

export const ALL_JOINS =
  JoinCapability.Inner |
  JoinCapability.Left |
  JoinCapability.Right |
  JoinCapability.Full |
  JoinCapability.Cross;

// ============================================================================
// Descriptor
// ============================================================================

/**
 * Immutable capability descriptor of one backend
 */
export class CapabilityDescriptor {
  private readonly flags: ReadonlyMap<CapabilityCategory, number>;

  constructor(flags: ReadonlyMap<CapabilityCategory, number>) {
    this.flags = new Map(flags);
    Object.freeze(this);
  }

  /**
   * Check if any capability of a category is available
   */
  supportsCategory(category: CapabilityCategory): boolean {
    return (this.flags.get(category) ?? 0) !== 0;
  }

  /**
   * Check a specific capability. A combined mask requires every bit.
   */
  supports<C extends CapabilityCategory>(
    category: C,
    capability: CategoryFlags[C]
  ): boolean {
    const mask = this.flags.get(category) ?? 0;
    const bits: number = capability;
    return bits !== 0 && (mask & bits) === bits;
  }

  /**
   * Raw bitmask of a category
   */
  mask(category: CapabilityCategory): number {
    return this.flags.get(category) ?? 0;
  }

  /**
   * Categories with at least one capability
   */
  categories(): CapabilityCategory[] {
    return [...this.flags.entries()]
      .filter(([, mask]) => mask !== 0)
      .map(([category]) => category);
  }
}

/**
 * Accumulates flags, then freezes them into a descriptor
 */
export class CapabilityDescriptorBuilder {
  private readonly flags = new Map<CapabilityCategory, number>();

  add<C extends CapabilityCategory>(
    category: C,
    ...capabilities: CategoryFlags[C][]
  ): this {
    let mask = this.flags.get(category) ?? 0;
    for (const capability of capabilities) mask |= capability;
    this.flags.set(category, mask);
    return this;
  }

  /**
   * Add flags only when the server version is at least `minimum`
   */
  addSince<C extends CapabilityCategory>(
    version: ServerVersion,
    minimum: ServerVersion,
    category: C,
    ...capabilities: CategoryFlags[C][]
  ): this {
    return versionAtLeast(version, minimum)
      ? this.add(category, ...capabilities)
      : this;
  }

  build(): CapabilityDescriptor {
    return new CapabilityDescriptor(this.flags);
  }
}

// ============================================================================
// Server versions
// ============================================================================

export type ServerVersion = readonly [number, number, number];

/**
 * Parse "3.39.4", "16.2", "8.0.35-log" into a version triple
 */
export function parseServerVersion(text: string): ServerVersion {
  const match = /(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(text);
  if (!match) {
    throw new Error(`Cannot parse server version "${text}"`);
  }
  return [
    parseInt(match[1], 10),
    match[2] ? parseInt(match[2], 10) : 0,
    match[3] ? parseInt(match[3], 10) : 0,
  ];
}

export function compareVersions(a: ServerVersion, b: ServerVersion): number {
  for (let i = 0; i < 3; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

export function versionAtLeast(
  version: ServerVersion,
  minimum: ServerVersion
): boolean {
  return compareVersions(version, minimum) >= 0;
}

export function formatVersion(version: ServerVersion): string {
  return version.join(".");
}
