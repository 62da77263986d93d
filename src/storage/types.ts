// Metadata storage backend interface.
//
// Backends are content-addressed: put() returns an identifier derived from the
// bytes, get() retrieves by that identifier, and uriFor() turns the identifier
// into the metadata pointer recorded on the token.

export interface StorageBackend {
  /** Store data and return a content identifier (hash or CID) */
  put(data: Buffer): Promise<string>;

  /** Retrieve data by content identifier, or null if not found */
  get(cid: string): Promise<Buffer | null>;

  /** Metadata pointer (URI) under which the content is reachable */
  uriFor(cid: string): string;

  /** Health check -- returns true if the backend is operational */
  healthy(): Promise<boolean>;
}
