/**
 * SQLite-backed CursorStore
 *
 * Stores the token under a fixed key in ingestion_cursor, so the resume
 * point survives process restarts alongside the ingested contracts.
 */

import type { CursorStore } from "@/interfaces";
import {
  getCursorToken,
  setCursorToken,
  deleteCursorToken,
} from "@/db/repos/cursorRepo";
import { CONTRACTS_FINDER_CURSOR_KEY } from "@/constants/clients/contractsFinder";

export class SqliteCursorStore implements CursorStore {
  constructor(private readonly cursorKey: string = CONTRACTS_FINDER_CURSOR_KEY) {}

  load(): string | null {
    return getCursorToken(this.cursorKey);
  }

  save(token: string): void {
    setCursorToken(this.cursorKey, token);
  }

  clear(): void {
    deleteCursorToken(this.cursorKey);
  }
}
