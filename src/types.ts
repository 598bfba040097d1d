export interface AddressComponents {
  locality?: string;
  region?: string;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

/** One result as the provider returned it. */
export interface ProviderRecord {
  /** Shown in the panel and written back into the input. */
  label: string;
  /** Provider-side id (Mapbox feature id, Google place id). */
  id?: string;
  components?: AddressComponents;
  coords?: Coordinates;
}

export interface Suggestion {
  readonly label: string;
  readonly raw: ProviderRecord;
}

export interface SearchProvider {
  readonly name: string;
  /** Resolves to a lazy, single-pass sequence of results. */
  search(query: string): Promise<Iterable<ProviderRecord>>;
  /** Looks up components for records whose search result carried none. */
  resolve?(record: ProviderRecord): Promise<AddressComponents | undefined>;
}
