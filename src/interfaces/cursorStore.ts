/**
 * CursorStore: persistence of a single opaque pagination token
 *
 * Absence of a token means "start fresh". The ingestor is the only writer.
 */
export interface CursorStore {
  /** Token persisted by a previous page, or null */
  load(): string | null;

  /** Replace the persisted token */
  save(token: string): void;

  /** Forget the token so the next run starts from the initial query */
  clear(): void;
}
