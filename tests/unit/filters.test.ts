/**
 * Unit tests for the strict civil-works and positive-spend filters
 */

import { describe, it, expect } from "vitest";
import { filterStrictCivilWorks, filterPositiveSpend } from "@/filters";
import { buildContract } from "../helpers/builders";

describe("filterStrictCivilWorks", () => {
  it("should keep only strict civil-works CPV prefixes", () => {
    const contracts = [
      buildContract({ id: "roads", cpvCode: "452331402" }),
      buildContract({ id: "buildings", cpvCode: "45210000" }),
      buildContract({ id: "site", cpvCode: "45100000" }),
      buildContract({ id: "padded", cpvCode: " 45252000" }),
      buildContract({ id: "design", cpvCode: "71311000" }),
      buildContract({ id: "install", cpvCode: "45300000" }),
    ];

    expect(filterStrictCivilWorks(contracts).map((c) => c.id)).toEqual([
      "roads",
      "site",
      "padded",
    ]);
  });

  it("should accept custom prefixes", () => {
    const contracts = [
      buildContract({ id: "a", cpvCode: "71311000" }),
      buildContract({ id: "b", cpvCode: "45233140" }),
    ];
    expect(filterStrictCivilWorks(contracts, ["71"]).map((c) => c.id)).toEqual(["a"]);
  });
});

describe("filterPositiveSpend", () => {
  it("should drop zero and unparsable amounts", () => {
    const contracts = [
      buildContract({ id: "zero", amount: 0 }),
      buildContract({ id: "zero-text", amount: "£0.00" }),
      buildContract({ id: "text", amount: "n/a" }),
      buildContract({ id: "one", amount: 1 }),
      buildContract({ id: "money", amount: "£12,500.00" }),
    ];

    expect(filterPositiveSpend(contracts).map((c) => c.id)).toEqual([
      "one",
      "money",
    ]);
  });
});
