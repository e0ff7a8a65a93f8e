/**
 * E2E Offline Test: ingest → canonicalize → screen
 *
 * Runs the three stage pipelines in order on a real migrated DB, with
 * fixture HTTP responses and the fixture material reference table.
 */

import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createTestDb, type TestDbHarness } from "../helpers/testDb";
import { createMockHttp, loadFixtureJson } from "../helpers/mockHttp";
import {
  runBuyerCanonicalizationPipeline,
  runCarbonScreeningPipeline,
  runContractsFinderPipeline,
} from "@/ingestion";
import { buildUrl } from "@/clients/http";
import {
  getContractById,
  getLatestRunByStage,
  listBuyerMap,
  listContractRisk,
} from "@/db";
import { MaterialReferenceError } from "@/catalog";
import { CONTRACTS_FINDER_SEARCH_URL } from "@/constants/clients/contractsFinder";
import type { Logger } from "@/types";

const MATERIALS_PATH = join("tests", "fixtures", "materials", "valid.csv");

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

async function ingestFixtures(): Promise<void> {
  const mock = createMockHttp();
  mock.on(
    buildUrl(CONTRACTS_FINDER_SEARCH_URL, {
      limit: 100,
      publishedFrom: "2025-01-01",
      publishedTo: "2025-12-31",
    }),
    loadFixtureJson("contractsFinder/page1.json"),
  );
  mock.on(
    `${CONTRACTS_FINDER_SEARCH_URL}?cursor=page2`,
    loadFixtureJson("contractsFinder/page2.json"),
  );

  await runContractsFinderPipeline({
    httpGet: mock.get,
    sleep: async () => {},
    logger: silentLogger,
    config: {
      publishedFrom: "2025-01-01",
      publishedTo: "2025-12-31",
      pageLimit: 100,
      acceptedCpvPrefixes: ["45", "71"],
      interPageDelayMs: 0,
    },
  });
}

describe("E2E: screening pipeline", () => {
  let harness: TestDbHarness | null = null;
  let exportDir: string | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
    if (exportDir) {
      rmSync(exportDir, { recursive: true, force: true });
      exportDir = null;
    }
  });

  it("should canonicalize buyers of the strict civil-works subset", async () => {
    harness = createTestDb();
    await ingestFixtures();

    const result = await runBuyerCanonicalizationPipeline({ exportDir: null });

    expect(result.contractsUpdated).toBe(2);
    expect(listBuyerMap()).toEqual([
      { buyer_name_raw: "Acme Co", buyer_name_canonical: "Acme Co", cluster_key: "AC" },
      {
        buyer_name_raw: "Department for Transport",
        buyer_name_canonical: "Department for Transport",
        cluster_key: "DFT",
      },
    ]);
    expect(getContractById("ocds-test-0001")?.buyerName).toBe(
      "Department for Transport",
    );
    // Design services (CPV 71) fall outside the strict subset
    expect(getContractById("ocds-test-0002")?.buyerName).toBeNull();

    const run = getLatestRunByStage("canonicalize");
    expect(run?.status).toBe("success");
    expect(JSON.parse(run?.counters_json ?? "{}")).toEqual({
      contracts_total: 3,
      contracts_strict: 2,
      clusters: 2,
      map_rows: 2,
      contracts_updated: 2,
    });
  });

  it("should screen, rank, store and export the strict subset", async () => {
    harness = createTestDb();
    exportDir = mkdtempSync(join(tmpdir(), "screening-"));
    await ingestFixtures();
    await runBuyerCanonicalizationPipeline({ exportDir: null });

    const result = await runCarbonScreeningPipeline({
      materialReferencePath: MATERIALS_PATH,
      minSpend: 5000,
      exportDir,
    });

    expect(result.records.map((r) => [r.contract.id, r.pqeStatus])).toEqual([
      ["ocds-test-0001", "CALCULATED"],
      ["ocds-test-0005", "SKIPPED_LOW_VALUE"],
    ]);
    expect(result.summary).toEqual({
      total: 2,
      CALCULATED: 1,
      SKIPPED_LOW_VALUE: 1,
      SKIPPED_NO_REF: 0,
      SKIPPED_INVALID_REF: 0,
      LOW: 0,
      MEDIUM: 0,
      HIGH: 1,
      CRITICAL: 0,
    });

    const [top] = listContractRisk();
    expect(top).toMatchObject({
      rank: 1,
      id: "ocds-test-0001",
      buyer_name: "Department for Transport",
      detected_material_id: "MAT_ASPHALT",
      est_material_tonnes: 5000,
      est_co2e_tonnes: 500,
      co2e_range_low: 375,
      co2e_range_high: 625,
      risk_category: "HIGH",
      data_source_ref: "test-ref-asphalt",
    });

    const csvPath = join(exportDir, "carbon_risk_screened.csv");
    expect(existsSync(csvPath)).toBe(true);
    const lines = readFileSync(csvPath, "utf-8").split("\n");
    expect(lines[1].startsWith("1,ocds-test-0001,A38 carriageway resurfacing,")).toBe(
      true,
    );
    expect(lines[2].startsWith("2,ocds-test-0005,Footbridge replacement,")).toBe(true);

    const run = getLatestRunByStage("screen");
    expect(run?.status).toBe("success");
  });

  it("should fail before creating a run when the material table is missing", async () => {
    harness = createTestDb();

    await expect(
      runCarbonScreeningPipeline({
        materialReferencePath: join("tests", "fixtures", "materials", "absent.csv"),
        exportDir: null,
      }),
    ).rejects.toThrow(MaterialReferenceError);

    expect(getLatestRunByStage("screen")).toBeUndefined();
  });
});
