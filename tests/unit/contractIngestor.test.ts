/**
 * Unit tests for ContractIngestor
 *
 * Runs the pagination loop against the mock HTTP harness and an in-memory
 * cursor store; no DB, no network
 */

import { describe, it, expect, vi } from "vitest";
import { ContractIngestor } from "@/ingestion/contractIngestor";
import { buildUrl, HttpError } from "@/clients/http";
import { CONTRACTS_FINDER_SEARCH_URL } from "@/constants/clients/contractsFinder";
import type { CursorStore } from "@/interfaces";
import type { IngestionConfig, Logger } from "@/types";
import { createMockHttp, loadFixtureJson } from "../helpers/mockHttp";

const CONFIG: IngestionConfig = {
  searchUrl: CONTRACTS_FINDER_SEARCH_URL,
  publishedFrom: "2025-01-01",
  publishedTo: "2025-12-31",
  pageLimit: 100,
  acceptedCpvPrefixes: ["45", "71"],
  interPageDelayMs: 700,
  descriptionMaxLength: 500,
};

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

class MemoryCursorStore implements CursorStore {
  public saves: string[] = [];

  constructor(private token: string | null = null) {}

  load(): string | null {
    return this.token;
  }

  save(token: string): void {
    this.saves.push(token);
    this.token = token;
  }

  clear(): void {
    this.token = null;
  }
}

function setup(cursor: string | null = null) {
  const mock = createMockHttp();
  const cursorStore = new MemoryCursorStore(cursor);
  const sleep = vi.fn(async (_ms: number) => {});
  const ingestor = new ContractIngestor({
    cursorStore,
    config: CONFIG,
    httpGet: mock.get,
    sleep,
    logger: silentLogger,
  });
  return { mock, cursorStore, sleep, ingestor };
}

describe("ContractIngestor", () => {
  it("should page through results, filter and deduplicate", async () => {
    const { mock, cursorStore, sleep, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    const outcome = await ingestor.run();

    expect(outcome.state).toBe("DONE");
    expect(outcome.stopReason).toBe("complete");
    expect(outcome.error).toBeUndefined();
    expect(outcome.records.map((r) => r.id)).toEqual([
      "ocds-test-0001",
      "ocds-test-0002",
      "ocds-test-0005",
    ]);
    expect(outcome.counters).toEqual({
      pages_fetched: 2,
      releases_seen: 6,
      contracts_accepted: 3,
      duplicates: 1,
      rejected_unknown_code: 1,
      rejected_prefix: 1,
    });
    expect(mock.getRequestedUrls()).toEqual([FIRST_PAGE_URL, SECOND_PAGE_URL]);
    expect(cursorStore.saves).toEqual([SECOND_PAGE_URL]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(700);
    expect(ingestor.state).toBe("DONE");
  });

  it("should keep the first occurrence of a duplicated release", async () => {
    const { mock, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    const outcome = await ingestor.run();
    const first = outcome.records[0];

    expect(first.publishedDate).toBe("2025-02-03T10:00:00Z");
    expect(first.buyerCountry).toBe("England");
  });

  it("should resume from the persisted cursor without search parameters", async () => {
    const { mock, ingestor } = setup(SECOND_PAGE_URL);
    mock.on(SECOND_PAGE_URL, loadFixtureJson("contractsFinder/page2.json"));

    const outcome = await ingestor.run();

    expect(mock.getRequestedUrls()).toEqual([SECOND_PAGE_URL]);
    expect(outcome.records.map((r) => r.id)).toEqual([
      "ocds-test-0001",
      "ocds-test-0005",
    ]);
    expect(outcome.counters.pages_fetched).toBe(1);
    expect(outcome.counters.duplicates).toBe(0);
  });

  it("should stop on a non-200 status and keep records and cursor", async () => {
    const { mock, cursorStore, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.onStatus(SECOND_PAGE_URL, 503, "busy", "Service Unavailable");

    const outcome = await ingestor.run();

    expect(outcome.state).toBe("ABORTED");
    expect(outcome.stopReason).toBe("http_status");
    expect(outcome.error).toBeInstanceOf(HttpError);
    expect(outcome.error?.message).toBe(
      `HTTP 503 Service Unavailable - ${SECOND_PAGE_URL} - busy`,
    );
    expect(outcome.records.map((r) => r.id)).toEqual([
      "ocds-test-0001",
      "ocds-test-0002",
    ]);
    expect(outcome.counters.pages_fetched).toBe(1);
    expect(cursorStore.load()).toBe(SECOND_PAGE_URL);
  });

  it("should end DONE on an empty page", async () => {
    const { mock, sleep, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, {
      releases: [],
      links: { next: SECOND_PAGE_URL },
    });

    const outcome = await ingestor.run();

    expect(outcome.state).toBe("DONE");
    expect(outcome.stopReason).toBe("empty_page");
    expect(outcome.counters.pages_fetched).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should abort with the error when a request throws", async () => {
    const { mock, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, loadFixtureJson("contractsFinder/page1.json"));
    mock.onCustom(SECOND_PAGE_URL, async () => {
      throw new Error("connection reset");
    });

    const outcome = await ingestor.run();

    expect(outcome.state).toBe("ABORTED");
    expect(outcome.stopReason).toBe("fatal_error");
    expect(outcome.error?.message).toBe("connection reset");
    expect(outcome.records).toHaveLength(2);
    expect(ingestor.state).toBe("ABORTED");
  });

  it("should abort on a malformed payload", async () => {
    const { mock, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, "<html>maintenance</html>");

    const outcome = await ingestor.run();

    expect(outcome.stopReason).toBe("fatal_error");
    expect(outcome.error?.message).toBe(
      "Malformed search response: expected JSON object, got string",
    );
  });

  it("should refuse to run twice", async () => {
    const { mock, ingestor } = setup();
    mock.on(FIRST_PAGE_URL, { releases: [] });

    await ingestor.run();

    await expect(ingestor.run()).rejects.toThrow(
      "ContractIngestor.run() may only be called once per instance",
    );
  });

  it("should apply the configured CPV prefixes", async () => {
    const mock = createMockHttp();
    const ingestor = new ContractIngestor({
      cursorStore: new MemoryCursorStore(),
      config: { ...CONFIG, acceptedCpvPrefixes: ["71"] },
      httpGet: mock.get,
      sleep: async () => {},
      logger: silentLogger,
    });
    mock.on(FIRST_PAGE_URL, {
      releases: [
        { ocid: "ocds-works", tender: { classification: { id: "45233140" } } },
        { ocid: "ocds-design", tender: { classification: { id: "71311000" } } },
      ],
    });

    const outcome = await ingestor.run();

    expect(outcome.records.map((r) => r.id)).toEqual(["ocds-design"]);
    expect(outcome.counters.rejected_prefix).toBe(1);
  });
});
