/**
 * Unit tests for buyer identity utilities
 *
 * Tests pure, deterministic normalization and key derivation
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  normalizeBuyerName,
  toAcronym,
  deriveClusterKey,
  isAcronymForm,
} from "@/utils/identity/buyerIdentity";

describe("normalizeBuyerName", () => {
  it("should return empty string for empty input", () => {
    expect(normalizeBuyerName("")).toBe("");
    expect(normalizeBuyerName(null)).toBe("");
    expect(normalizeBuyerName(undefined)).toBe("");
  });

  it("should trim, lowercase and collapse whitespace", () => {
    expect(normalizeBuyerName("  Network   Rail ")).toBe("network rail");
  });

  it("should expand legal suffixes", () => {
    expect(normalizeBuyerName("Acme Ltd")).toBe("acme limited");
    expect(normalizeBuyerName("Acme Ltd.")).toBe("acme limited");
    expect(normalizeBuyerName("Acme Limited")).toBe("acme limited");
    expect(normalizeBuyerName("Acme PLC")).toBe("acme plc");
    expect(normalizeBuyerName("Acme Co")).toBe("acme company");
  });

  it("should expand government abbreviations", () => {
    expect(normalizeBuyerName("Welsh Govt")).toBe("welsh government");
    expect(normalizeBuyerName("Scottish Gov")).toBe("scottish government");
  });

  it("should replace ampersands", () => {
    expect(normalizeBuyerName("  Acme Co & Sons LTD ")).toBe(
      "acme company and sons limited",
    );
  });

  it("should not expand abbreviations inside longer words", () => {
    expect(normalizeBuyerName("County Council")).toBe("county council");
    expect(normalizeBuyerName("Governance Board")).toBe("governance board");
  });
});

describe("toAcronym", () => {
  it("should join uppercase initials", () => {
    expect(toAcronym("department for transport")).toBe("DFT");
    expect(toAcronym("")).toBe("");
  });
});

describe("deriveClusterKey", () => {
  it("should use the acronym for multi-word names", () => {
    expect(deriveClusterKey("department for transport")).toBe("DFT");
  });

  it("should use the uppercased name for a single word", () => {
    expect(deriveClusterKey("dft")).toBe("DFT");
    expect(deriveClusterKey("highways")).toBe("HIGHWAYS");
    expect(deriveClusterKey("")).toBe("");
  });
});

describe("isAcronymForm", () => {
  it("should compare the spaces-stripped uppercase variant to the key", () => {
    expect(isAcronymForm("DfT", "DFT")).toBe(true);
    expect(isAcronymForm("D F T", "DFT")).toBe(true);
    expect(isAcronymForm("Department for Transport", "DFT")).toBe(false);
  });
});
