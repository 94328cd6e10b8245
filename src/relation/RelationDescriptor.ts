/**
 * sqlweave Relation Descriptors
 *
 * Relations are declared on a model definition and resolved against the
 * model registry before any query runs. Property names are camelCase; they
 * become snake_case columns when SQL is built.
 */

interface RelationBase {
  /** Name of the target model in the registry */
  readonly target: string;
  /** Slot on the target that points back at the parent (hasOne/hasMany/polymorphic) */
  readonly inverseOf?: string;
  /** Per-relation cache lifetime, overrides the database default */
  readonly cacheTtlMs?: number;
}

/**
 * The target row holds `foreignKey` pointing at the owner's `localKey`
 * (defaults to the owner's primary key)
 */
export interface HasOneRelation extends RelationBase {
  readonly kind: "hasOne";
  readonly foreignKey: string;
  readonly localKey?: string;
}

export interface HasManyRelation extends RelationBase {
  readonly kind: "hasMany";
  readonly foreignKey: string;
  readonly localKey?: string;
}

/**
 * The owner row holds `foreignKey` pointing at the target's `ownerKey`
 * (defaults to the target's primary key)
 */
export interface BelongsToRelation extends RelationBase {
  readonly kind: "belongsTo";
  readonly foreignKey: string;
  readonly ownerKey?: string;
}

/**
 * Target rows point at several owner models through a (type, id) pair.
 * `typeValue` defaults to the owner model's name.
 */
export interface PolymorphicRelation extends RelationBase {
  readonly kind: "polymorphic";
  readonly foreignKey: string;
  readonly typeColumn: string;
  readonly typeValue?: string;
  readonly localKey?: string;
  readonly many: boolean;
}

export type RelationDescriptor =
  | HasOneRelation
  | HasManyRelation
  | BelongsToRelation
  | PolymorphicRelation;

export type RelationKind = RelationDescriptor["kind"];

export type RelationMap = Readonly<Record<string, RelationDescriptor>>;

type Options<T extends RelationDescriptor> = Omit<T, "kind" | "target" | "foreignKey">;

// ============================================================================
// Constructors
// ============================================================================

export function hasOne(
  target: string,
  foreignKey: string,
  options: Options<HasOneRelation> = {}
): HasOneRelation {
  return Object.freeze({ ...options, kind: "hasOne", target, foreignKey });
}

export function hasMany(
  target: string,
  foreignKey: string,
  options: Options<HasManyRelation> = {}
): HasManyRelation {
  return Object.freeze({ ...options, kind: "hasMany", target, foreignKey });
}

export function belongsTo(
  target: string,
  foreignKey: string,
  options: Options<BelongsToRelation> = {}
): BelongsToRelation {
  return Object.freeze({ ...options, kind: "belongsTo", target, foreignKey });
}

export function polymorphic(
  target: string,
  foreignKey: string,
  options: Omit<Options<PolymorphicRelation>, "many"> & { many?: boolean }
): PolymorphicRelation {
  return Object.freeze({
    ...options,
    kind: "polymorphic",
    target,
    foreignKey,
    many: options.many ?? true,
  });
}

/**
 * Whether the relation fills its slot with an array
 */
export function isToMany(relation: RelationDescriptor): boolean {
  switch (relation.kind) {
    case "hasMany":
      return true;
    case "polymorphic":
      return relation.many;
    case "hasOne":
    case "belongsTo":
      return false;
  }
}
