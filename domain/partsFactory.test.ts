import { describe, expect, it } from "vitest";
import { build, buildWith } from "./partsFactory.js";
import { Parts } from "./parts.js";
import { Part, type PartFields } from "./part.js";
import { MalformedRowError } from "./errors.js";
import type { ConfigTable, PartRole } from "./core.js";

const ROAD: ConfigTable = [
  ["chain", "10-speed"],
  ["tire_size", "23"],
  ["tape_color", "red"],
];

const MOUNTAIN: ConfigTable = [
  ["chain", "10-speed"],
  ["tire_size", "2.1"],
  ["front_shock", "Manitou", false],
  ["rear_shock", "Fox"],
];

describe("build", () => {
  it("one part per row, in row order", () => {
    const parts = build(MOUNTAIN);
    expect(parts).toBeInstanceOf(Parts);
    expect(parts.size()).toBe(4);
    expect([...parts].map((p) => p.name)).toEqual(["chain", "tire_size", "front_shock", "rear_shock"]);
  });

  it("builds Part entities with row fields", () => {
    const [chain] = build(ROAD);
    expect(chain).toBeInstanceOf(Part);
    expect(chain).toMatchObject({ name: "chain", description: "10-speed", needsSpare: true });
  });

  it("road config: every part is a spare", () => {
    expect(build(ROAD).spares().map((p) => p.name)).toEqual(["chain", "tire_size", "tape_color"]);
  });

  it("mountain config: front_shock excluded from spares", () => {
    const spares = build(MOUNTAIN).spares();
    expect(spares.map((p) => p.name)).toEqual(["chain", "tire_size", "rear_shock"]);
    expect(spares.map((p) => p.description)).toEqual(["10-speed", "2.1", "Fox"]);
  });

  it("explicit true kept as a spare", () => {
    expect(build([["flag", "tall and orange", true]]).spares()).toHaveLength(1);
  });

  it("empty config builds an empty collection", () => {
    const parts = build([]);
    expect(parts.size()).toBe(0);
    expect(parts.spares()).toEqual([]);
  });

  it("single-entry row rejected with its index", () => {
    expect(() => Reflect.apply(build, undefined, [[["chain"]]])).toThrow(MalformedRowError);
    expect(() => Reflect.apply(build, undefined, [[["chain"]]])).toThrow(
      "Malformed configuration row at index 0"
    );
  });

  it("reports the index of a later malformed row", () => {
    let caught: unknown;
    try {
      Reflect.apply(build, undefined, [[["chain", "10-speed"], ["tire_size", "23"], []]]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedRowError);
    if (!(caught instanceof MalformedRowError)) return;
    expect(caught.rowIndex).toBe(2);
    expect(caught.metadata).toEqual({ rowIndex: 2 });
  });

  it("passes parts to a substitute collection", () => {
    const names = build(MOUNTAIN, (parts) => parts.map((p) => p.name).join(","));
    expect(names).toBe("chain,tire_size,front_shock,rear_shock");
  });
});

describe("buildWith", () => {
  interface TaggedPart extends PartRole {
    readonly tag: string;
  }

  const tagged = (fields: PartFields): TaggedPart => ({
    name: fields.name ?? "",
    description: fields.description ?? "",
    needsSpare: fields.needsSpare ?? true,
    tag: `#${fields.name ?? ""}`,
  });

  it("uses substitute entity and collection types", () => {
    const parts = buildWith(MOUNTAIN, tagged, Parts.from);
    expect(parts.spares().map((p) => p.tag)).toEqual(["#chain", "#tire_size", "#rear_shock"]);
  });
});
