/**
 * Unit tests for the top-risks console report
 */

import { describe, it, expect } from "vitest";
import { formatTopRisks } from "@/reports";
import { screenContracts } from "@/signal/risk";
import { buildContract, buildMaterial } from "../helpers/builders";

const ASPHALT = buildMaterial({
  materialId: "MAT_ASPHALT",
  materialName: "Asphalt",
  keywords: ["asphalt"],
  pricePerTonne: 50,
  carbonFactorKgCo2ePerTonne: 100,
});

const records = screenContracts(
  [
    buildContract({ id: "fence", title: "Fence", amount: 100, buyerNameRaw: "Acme Co" }),
    buildContract({
      id: "road",
      title: "A38",
      description: "asphalt overlay",
      buyerName: "DfT",
    }),
  ],
  [ASPHALT],
);

describe("formatTopRisks", () => {
  it("should render a padded table in rank order", () => {
    expect(formatTopRisks(records).split("\n")).toEqual([
      "buyer_name  title  est_co2e_tonnes  detected_material_name",
      "DfT" + " ".repeat(9) + "A38" + " ".repeat(4) + "200" + " ".repeat(14) + "Asphalt",
      "Acme Co" + " ".repeat(5) + "Fence",
    ]);
  });

  it("should limit the number of rows", () => {
    const lines = formatTopRisks(records, 1).split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[1].startsWith("DfT")).toBe(true);
  });

  it("should render only the header for no records", () => {
    expect(formatTopRisks([])).toBe(
      "buyer_name  title  est_co2e_tonnes  detected_material_name",
    );
  });
});
