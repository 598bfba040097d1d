import { z } from 'zod';
import type { ProviderRecord, SearchProvider } from './types';

export const MAPBOX_ENDPOINT = 'https://api.mapbox.com/geocoding/v5/mapbox.places';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

const contextSchema = z.object({ id: z.string(), text: z.string() });

const featureSchema = z.object({
  id: z.string(),
  place_name: z.string(),
  text: z.string().optional(),
  place_type: z.array(z.string()).default([]),
  // [lon, lat]
  center: z.tuple([z.number(), z.number()]).optional(),
  context: z.array(contextSchema).default([]),
});

const responseSchema = z.object({ features: z.array(featureSchema) });

export type MapboxFeature = z.infer<typeof featureSchema>;

export interface MapboxOptions {
  accessToken: string;
  limit: number;
  countries: readonly string[];
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Mapbox forward geocoding in autocomplete mode.
 * Throws on HTTP errors and malformed payloads; callers treat both as "no results".
 */
export class MapboxGeocoder implements SearchProvider {
  readonly name = 'mapbox';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: MapboxOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  buildUrl(query: string): URL {
    const url = new URL(`${MAPBOX_ENDPOINT}/${encodeURIComponent(query)}.json`);
    url.searchParams.set('access_token', this.options.accessToken);
    url.searchParams.set('autocomplete', 'true');
    url.searchParams.set('limit', String(this.options.limit));
    if (this.options.countries.length) {
      url.searchParams.set('country', this.options.countries.join(','));
    }
    return url;
  }

  async search(query: string): Promise<Iterable<ProviderRecord>> {
    const { timeoutMs } = this.options;
    const res = await this.fetchImpl(
      this.buildUrl(query).toString(),
      timeoutMs ? { signal: AbortSignal.timeout(timeoutMs) } : undefined,
    );
    if (!res.ok) throw new Error('Geocoding HTTP ' + res.status);
    const parsed = responseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Malformed geocoding response: ' + (parsed.error.issues[0]?.message ?? 'unknown'));
    }
    return toRecords(parsed.data.features);
  }
}

function componentOf(feature: MapboxFeature, type: 'place' | 'region'): string | undefined {
  if (feature.place_type.includes(type)) return feature.text;
  return feature.context.find((c) => c.id.startsWith(type + '.'))?.text;
}

export function* toRecords(features: readonly MapboxFeature[]): Generator<ProviderRecord> {
  for (const f of features) {
    const record: ProviderRecord = {
      id: f.id,
      label: f.place_name,
      components: { locality: componentOf(f, 'place'), region: componentOf(f, 'region') },
    };
    if (f.center) record.coords = { lat: f.center[1], lon: f.center[0] };
    yield record;
  }
}
