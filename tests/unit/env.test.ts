/**
 * Unit tests for environment variable readers
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { readEnvList, readEnvNumber, readEnvString } from "@/utils/config/env";

const VAR = "CARBON_SCREEN_TEST_VAR";

describe("env readers", () => {
  afterEach(() => {
    delete process.env[VAR];
    vi.restoreAllMocks();
  });

  it("should fall back when a string is unset or blank", () => {
    expect(readEnvString(VAR, "default")).toBe("default");
    process.env[VAR] = "   ";
    expect(readEnvString(VAR, "default")).toBe("default");
    process.env[VAR] = " value ";
    expect(readEnvString(VAR, "default")).toBe("value");
  });

  it("should parse finite numbers", () => {
    process.env[VAR] = "12.5";
    expect(readEnvNumber(VAR, 5)).toBe(12.5);
  });

  it("should warn and fall back on an invalid number", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env[VAR] = "abc";

    expect(readEnvNumber(VAR, 5)).toBe(5);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("should split, trim and drop empty list entries", () => {
    process.env[VAR] = " 45, 71 ,,";
    expect(readEnvList(VAR, ["45"])).toEqual(["45", "71"]);
  });

  it("should fall back when a list has no entries", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env[VAR] = ", ,";
    expect(readEnvList(VAR, ["45"])).toEqual(["45"]);
    delete process.env[VAR];
    expect(readEnvList(VAR, ["71"])).toEqual(["71"]);
  });
});
