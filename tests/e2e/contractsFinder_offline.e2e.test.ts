/**
 * E2E Offline Test: Contracts Finder ingestion into the database
 *
 * Mock HTTP (fixtures) + real migrated SQLite DB. Verifies persisted
 * contracts, the resume cursor and the run row for every stop reason.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../helpers/testDb";
import { createMockHttp, loadFixtureJson, type MockHttp } from "../helpers/mockHttp";
import { runContractsFinderPipeline, SqliteCursorStore } from "@/ingestion";
import { buildUrl } from "@/clients/http";
import { countContracts, getContractById, getLatestRunByStage } from "@/db";
import { CONTRACTS_FINDER_SEARCH_URL } from "@/constants/clients/contractsFinder";
import type { Logger } from "@/types";

const FIRST_PAGE_URL = buildUrl(CONTRACTS_FINDER_SEARCH_URL, {
  limit: 100,
  publishedFrom: "2025-01-01",
  publishedTo: "2025-12-31",
});
const SECOND_PAGE_URL = `${CONTRACTS_FINDER_SEARCH_URL}?cursor=page2`;

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function runPipeline(mock: MockHttp) {
  return runContractsFinderPipeline({
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

describe("E2E: Contracts Finder offline ingestion", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should persist accepted contracts and record a successful run", async () => {
    harness = createTestDb();
    const mock = createMockHttp();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    const result = await runPipeline(mock);

    expect(result.persisted).toBe(3);
    expect(countContracts()).toBe(3);

    const road = getContractById("ocds-test-0001");
    expect(road).toMatchObject({
      title: "A38 carriageway resurfacing",
      cpvCode: "452331402",
      amount: 250000,
      currency: "GBP",
      buyerNameRaw: "Department for Transport",
      buyerCountry: "England",
    });
    expect(getContractById("ocds-test-0002")?.amount).toBe("£12,500.00");
    expect(getContractById("ocds-test-0003")).toBeNull();

    const run = getLatestRunByStage("ingest");
    expect(run?.status).toBe("success");
    expect(run?.notes).toBe("complete");
    expect(JSON.parse(run?.counters_json ?? "{}")).toEqual({
      pages_fetched: 2,
      releases_seen: 6,
      contracts_accepted: 3,
      duplicates: 1,
      rejected_unknown_code: 1,
      rejected_prefix: 1,
      persisted: 3,
    });

    expect(new SqliteCursorStore().load()).toBe(SECOND_PAGE_URL);
  });

  it("should resume from the persisted cursor", async () => {
    harness = createTestDb();
    new SqliteCursorStore().save(SECOND_PAGE_URL);
    const mock = createMockHttp();
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    const result = await runPipeline(mock);

    expect(mock.getRequestedUrls()).toEqual([SECOND_PAGE_URL]);
    expect(result.persisted).toBe(2);
    expect(getContractById("ocds-test-0005")?.amount).toBe(4000);
  });

  it("should stop without throwing on a non-200 status", async () => {
    harness = createTestDb();
    const mock = createMockHttp();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.onStatus(SECOND_PAGE_URL, 503, "busy", "Service Unavailable");

    const result = await runPipeline(mock);

    expect(result.outcome.stopReason).toBe("http_status");
    expect(result.persisted).toBe(2);
    expect(countContracts()).toBe(2);

    const run = getLatestRunByStage("ingest");
    expect(run?.status).toBe("stopped");
    expect(run?.notes).toBe(
      `http_status: HTTP 503 Service Unavailable - ${SECOND_PAGE_URL} - busy`,
    );
    expect(new SqliteCursorStore().load()).toBe(SECOND_PAGE_URL);
  });

  it("should persist partial output and rethrow a fatal error", async () => {
    harness = createTestDb();
    const mock = createMockHttp();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.onCustom(SECOND_PAGE_URL, async () => {
      throw new Error("connection reset");
    });

    await expect(runPipeline(mock)).rejects.toThrow("connection reset");

    expect(countContracts()).toBe(2);
    const run = getLatestRunByStage("ingest");
    expect(run?.status).toBe("failure");
    expect(run?.notes).toBe("fatal_error: connection reset");
    expect(JSON.parse(run?.counters_json ?? "{}")).toMatchObject({
      pages_fetched: 1,
      persisted: 2,
    });
  });

  it("should be idempotent across repeated runs", async () => {
    harness = createTestDb();
    const mock = createMockHttp();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    await runPipeline(mock);
    new SqliteCursorStore().clear();
    await runPipeline(mock);

    expect(countContracts()).toBe(3);
  });
});
