/**
 * ContractIngestor: paginated, resumable retrieval of civil-works notices
 *
 * One instance owns one run: the dedup set, the accumulated records and
 * the state machine live on the instance and are discarded with it.
 *
 *   START → FETCHING → FILTERING → ADVANCING → (FETCHING …) → DONE | ABORTED
 *
 * run() never throws. Fatal conditions (exhausted retries, malformed
 * payloads) end in ABORTED with the error attached and every record
 * accepted so far; the caller persists them and decides how to surface
 * the failure. The cursor is saved after every page, so a later run
 * resumes from the last "next" link.
 */

import type {
  ContractRecord,
  HttpGetFn,
  HttpResponse,
  IngestionConfig,
  IngestionCounters,
  IngestionOutcome,
  IngestionState,
  IngestionStopReason,
  Logger,
} from "@/types";
import type { OcdsRelease } from "@/types/clients/contractsFinder";
import type { CursorStore } from "@/interfaces";
import { httpGet as defaultHttpGet, HttpError, toBodySnippet } from "@/clients/http";
import {
  extractCpv,
  isJsonObject,
  mapReleaseToContract,
  parseSearchPage,
} from "@/clients/contractsFinder";
import { UNKNOWN_CPV } from "@/constants/civilWorks";
import * as logger from "@/logger";

export interface ContractIngestorDeps {
  /** Resume-point persistence */
  cursorStore: CursorStore;

  /** Search window, page size and filter configuration */
  config: IngestionConfig;

  /**
   * Optional GET function (for testing/mocking)
   * Defaults to the production retrying client
   */
  httpGet?: HttpGetFn;

  /** Optional sleep used for the inter-page delay (for testing) */
  sleep?: (ms: number) => Promise<void>;

  /** Optional logger, defaults to the project logger */
  logger?: Logger;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createCounters(): IngestionCounters {
  return {
    pages_fetched: 0,
    releases_seen: 0,
    contracts_accepted: 0,
    duplicates: 0,
    rejected_unknown_code: 0,
    rejected_prefix: 0,
  };
}

export class ContractIngestor {
  private readonly cursorStore: CursorStore;
  private readonly config: IngestionConfig;
  private readonly httpGet: HttpGetFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  private readonly seenIds = new Set<string>();
  private readonly records: ContractRecord[] = [];
  private readonly counters: IngestionCounters = createCounters();
  private currentState: IngestionState = "START";
  private started = false;

  constructor(deps: ContractIngestorDeps) {
    this.cursorStore = deps.cursorStore;
    this.config = deps.config;
    this.httpGet = deps.httpGet ?? defaultHttpGet;
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.logger ?? logger;
  }

  get state(): IngestionState {
    return this.currentState;
  }

  /**
   * Run the pagination loop to completion
   *
   * @throws {Error} Only if called twice on the same instance
   */
  async run(): Promise<IngestionOutcome> {
    if (this.started) {
      throw new Error("ContractIngestor.run() may only be called once per instance");
    }
    this.started = true;

    const resumeUrl = this.cursorStore.load();
    let nextUrl: string | null = resumeUrl;

    this.log.info("Starting contract ingestion", {
      resumed: resumeUrl !== null,
      publishedFrom: this.config.publishedFrom,
      publishedTo: this.config.publishedTo,
      acceptedPrefixes: this.config.acceptedCpvPrefixes,
    });

    try {
      let firstRequest = resumeUrl === null;

      for (;;) {
        this.currentState = "FETCHING";
        this.log.info("Fetching page", {
          page: this.counters.pages_fetched + 1,
          saved: this.records.length,
        });

        const response = firstRequest
          ? await this.fetchInitialPage()
          : await this.fetchCursorPage(nextUrl);
        firstRequest = false;

        if (response.status !== 200) {
          const error = new HttpError({
            status: response.status,
            statusText: response.statusText,
            url: response.url,
            bodySnippet: toBodySnippet(response.body),
          });
          this.log.error("Remote returned non-200 status, stopping", {
            status: response.status,
            url: response.url,
          });
          return this.finish("ABORTED", "http_status", error);
        }

        const page = parseSearchPage(response.body);
        this.counters.pages_fetched++;

        if (page.releases.length === 0) {
          this.log.info("No more releases, end reached");
          return this.finish("DONE", "empty_page");
        }

        this.currentState = "FILTERING";
        for (const release of page.releases) {
          this.acceptRelease(release);
        }

        this.currentState = "ADVANCING";
        if (page.nextUrl === null) {
          this.log.info("Pagination complete");
          return this.finish("DONE", "complete");
        }

        nextUrl = page.nextUrl;
        this.cursorStore.save(nextUrl);
        await this.sleep(this.config.interPageDelayMs);
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error("Ingestion interrupted", {
        error: error.message,
        pagesFetched: this.counters.pages_fetched,
        saved: this.records.length,
      });
      return this.finish("ABORTED", "fatal_error", error);
    }
  }

  private fetchInitialPage(): Promise<HttpResponse> {
    return this.httpGet({
      url: this.config.searchUrl,
      query: {
        limit: this.config.pageLimit,
        publishedFrom: this.config.publishedFrom,
        publishedTo: this.config.publishedTo,
      },
    });
  }

  private fetchCursorPage(url: string | null): Promise<HttpResponse> {
    if (url === null) {
      throw new Error("No cursor URL to continue from");
    }
    return this.httpGet({ url });
  }

  /**
   * Filter one release and accumulate it if it qualifies
   */
  private acceptRelease(release: OcdsRelease): void {
    this.counters.releases_seen++;

    const ocid = release.ocid;
    if (typeof ocid !== "string" || ocid.length === 0) {
      return;
    }
    if (this.seenIds.has(ocid)) {
      this.counters.duplicates++;
      return;
    }

    const tender = isJsonObject(release.tender) ? release.tender : undefined;
    const cpv = extractCpv(tender, release);

    if (cpv === UNKNOWN_CPV) {
      this.counters.rejected_unknown_code++;
      return;
    }
    if (!this.config.acceptedCpvPrefixes.some((prefix) => cpv.startsWith(prefix))) {
      this.counters.rejected_prefix++;
      return;
    }

    this.records.push(
      mapReleaseToContract(release, ocid, cpv, this.config.descriptionMaxLength),
    );
    this.seenIds.add(ocid);
    this.counters.contracts_accepted++;
  }

  private finish(
    state: "DONE" | "ABORTED",
    stopReason: IngestionStopReason,
    error?: Error,
  ): IngestionOutcome {
    this.currentState = state;

    this.log.info("Contract ingestion finished", {
      state,
      stopReason,
      total: this.records.length,
      ...this.counters,
    });

    return {
      state,
      stopReason,
      records: [...this.records],
      counters: { ...this.counters },
      ...(error && { error }),
    };
  }
}
