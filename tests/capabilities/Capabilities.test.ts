/**
 * sqlweave Capability Unit Tests
 */

import {
  CapabilityCategory,
  CapabilityDescriptorBuilder,
  CteCapability,
  JoinCapability,
  ReturningCapability,
  SetOperationCapability,
  compareVersions,
  describeCapability,
  formatVersion,
  parseServerVersion,
  versionAtLeast,
} from "../../src/capabilities/Capabilities";

describe("CapabilityDescriptor", () => {
  const descriptor = new CapabilityDescriptorBuilder()
    .add(CapabilityCategory.SetOperations, SetOperationCapability.Union, SetOperationCapability.UnionAll)
    .add(CapabilityCategory.Cte, CteCapability.Basic)
    .add(CapabilityCategory.JoinOperations)
    .build();

  it("should report single capabilities", () => {
    expect(descriptor.supports(CapabilityCategory.SetOperations, SetOperationCapability.Union)).toBe(true);
    expect(descriptor.supports(CapabilityCategory.SetOperations, SetOperationCapability.Intersect)).toBe(false);
    expect(descriptor.supports(CapabilityCategory.Cte, CteCapability.Recursive)).toBe(false);
  });

  it("should require every bit of a combined mask", () => {
    const both = SetOperationCapability.Union | SetOperationCapability.UnionAll;
    const mixed = SetOperationCapability.Union | SetOperationCapability.Except;

    expect(descriptor.supports(CapabilityCategory.SetOperations, both)).toBe(true);
    expect(descriptor.supports(CapabilityCategory.SetOperations, mixed)).toBe(false);
  });

  it("should treat a category without flags as unsupported", () => {
    expect(descriptor.supportsCategory(CapabilityCategory.Cte)).toBe(true);
    expect(descriptor.supportsCategory(CapabilityCategory.JoinOperations)).toBe(false);
    expect(descriptor.supportsCategory(CapabilityCategory.JsonOperations)).toBe(false);
    expect(descriptor.supports(CapabilityCategory.JoinOperations, JoinCapability.Inner)).toBe(false);
  });

  it("should expose raw masks and the non-empty categories", () => {
    expect(descriptor.mask(CapabilityCategory.SetOperations)).toBe(3);
    expect(descriptor.mask(CapabilityCategory.ReturningClause)).toBe(0);
    expect(descriptor.categories()).toEqual([CapabilityCategory.SetOperations, CapabilityCategory.Cte]);
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it("should only add version-gated flags from the minimum version on", () => {
    const build = (version: readonly [number, number, number]) =>
      new CapabilityDescriptorBuilder()
        .addSince(version, [3, 35, 0], CapabilityCategory.ReturningClause, ReturningCapability.Basic)
        .build();

    expect(build([3, 34, 9]).supportsCategory(CapabilityCategory.ReturningClause)).toBe(false);
    expect(build([3, 35, 0]).supports(CapabilityCategory.ReturningClause, ReturningCapability.Basic)).toBe(true);
  });
});

describe("describeCapability()", () => {
  it("should name a flag by its category", () => {
    expect(describeCapability(CapabilityCategory.Cte, CteCapability.Recursive)).toBe("CTE.Recursive");
  });

  it("should join the names of a combined mask", () => {
    expect(
      describeCapability(
        CapabilityCategory.SetOperations,
        SetOperationCapability.Intersect | SetOperationCapability.ExceptAll
      )
    ).toBe("SET_OPERATIONS.Intersect|ExceptAll");
  });
});

describe("server versions", () => {
  it("should parse version strings with trailing text", () => {
    expect(parseServerVersion("3.39.4")).toEqual([3, 39, 4]);
    expect(parseServerVersion("16.2")).toEqual([16, 2, 0]);
    expect(parseServerVersion("8.0.35-log")).toEqual([8, 0, 35]);
    expect(parseServerVersion("10.11.6-MariaDB")).toEqual([10, 11, 6]);
  });

  it("should reject text without a number", () => {
    expect(() => parseServerVersion("unknown")).toThrow('Cannot parse server version "unknown"');
  });

  it("should compare part by part", () => {
    expect(compareVersions([3, 9, 0], [3, 10, 0])).toBeLessThan(0);
    expect(compareVersions([10, 0, 0], [9, 6, 5])).toBeGreaterThan(0);
    expect(versionAtLeast([8, 0, 31], [8, 0, 31])).toBe(true);
    expect(versionAtLeast([8, 0, 30], [8, 0, 31])).toBe(false);
  });

  it("should format a version triple", () => {
    expect(formatVersion([16, 0, 0])).toBe("16.0.0");
  });
});
