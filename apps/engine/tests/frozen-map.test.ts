import { describe, expect, it } from "vitest";

import { FrozenMap } from "@/lib/frozen-map";

describe("FrozenMap", () => {
  it("copies its entries", () => {
    const source = new Map([
      ["FG", 15],
      ["BG", 0],
    ]);
    const frozen = new FrozenMap(source);
    source.set("FG", 7);

    expect(frozen.get("FG")).toBe(15);
    expect(frozen.has("BG")).toBe(true);
    expect(frozen.size).toBe(2);
  });

  it("iterates in insertion order", () => {
    const frozen = new FrozenMap([
      ["FG", 15],
      ["BG", 0],
    ]);
    const seen: string[] = [];
    frozen.forEach((value, key, map) => {
      seen.push(`${key}=${value}`);
      expect(map).toBe(frozen);
    });

    expect(seen).toEqual(["FG=15", "BG=0"]);
    expect([...frozen]).toEqual([
      ["FG", 15],
      ["BG", 0],
    ]);
    expect([...frozen.keys()]).toEqual(["FG", "BG"]);
    expect([...frozen.values()]).toEqual([15, 0]);
    expect(Object.fromEntries(frozen.entries())).toEqual({ FG: 15, BG: 0 });
  });

  it("cannot be extended or reassigned", () => {
    const frozen = new FrozenMap<string, number>();

    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Reflect.set(frozen, "entriesByKey", new Map([["FG", 1]]))).toBe(false);
    expect(frozen.get("FG")).toBeUndefined();
  });
});
