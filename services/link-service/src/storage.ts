export interface UrlRecord {
  code: string;
  longUrl: string;
  createdAt: string;
}

/**
 * Append-only code -> url store. Implementations must make `create` an
 * insert-if-absent on the code so concurrent writers never share one.
 */
export interface UrlStore {
  init(): Promise<void>;
  create(longUrl: string): Promise<UrlRecord>;
  /** Resolves to null for an unknown code; rejects only on storage failure. */
  get(code: string): Promise<UrlRecord | null>;
  /** Point-in-time snapshot of every record, in insertion order. */
  list(): Promise<UrlRecord[]>;
  close(): Promise<void>;
}
