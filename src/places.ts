import type { AutocompleteConfig } from './config';
import type { AddressComponents, ProviderRecord, SearchProvider } from './types';

type PlacePrediction = Pick<google.maps.places.AutocompletePrediction, 'description' | 'place_id'>;

/** The part of `google.maps.places.AutocompleteService` this provider calls. */
export interface PredictionSource {
  getPlacePredictions(
    request: google.maps.places.AutocompletionRequest,
  ): Promise<{ predictions: PlacePrediction[] }>;
}

export interface PlaceComponent {
  longText: string | null;
  types: string[];
}

export type ComponentLookup = (placeId: string) => Promise<PlaceComponent[]>;

export interface PlacesOptions {
  countries: readonly string[];
  predictions: PredictionSource;
  lookupComponents?: ComponentLookup;
}

export class PlacesAutocomplete implements SearchProvider {
  readonly name = 'places';

  constructor(private readonly options: PlacesOptions) {}

  async search(query: string): Promise<Iterable<ProviderRecord>> {
    const { predictions } = await this.options.predictions.getPlacePredictions({
      input: query,
      types: ['geocode'],
      componentRestrictions: { country: [...this.options.countries] },
    });
    return predictions.map((p) => ({ id: p.place_id, label: p.description }));
  }

  async resolve(record: ProviderRecord): Promise<AddressComponents | undefined> {
    if (!record.id || !this.options.lookupComponents) return undefined;
    return pickComponents(await this.options.lookupComponents(record.id));
  }
}

export function pickComponents(components: readonly PlaceComponent[]): AddressComponents {
  const out: AddressComponents = {};
  for (const c of components) {
    if (!c.longText) continue;
    if (c.types.includes('locality')) out.locality = c.longText;
    if (c.types.includes('administrative_area_level_1')) out.region = c.longText;
  }
  return out;
}

export function placeComponentLookup(places: typeof google.maps.places): ComponentLookup {
  return async (placeId) => {
    const place = new places.Place({ id: placeId });
    await place.fetchFields({ fields: ['addressComponents'] });
    return place.addressComponents ?? [];
  };
}

/** The Places library when the page has loaded the Maps script with `libraries=places`. */
export function loadPlacesLibrary(): typeof google.maps.places | undefined {
  if (typeof google === 'undefined') return undefined;
  return google.maps?.places;
}

export function createPlacesProvider(
  config: AutocompleteConfig,
  library: typeof google.maps.places | undefined = loadPlacesLibrary(),
): PlacesAutocomplete | undefined {
  if (!library) return undefined;
  return new PlacesAutocomplete({
    countries: config.countries,
    predictions: new library.AutocompleteService(),
    lookupComponents: placeComponentLookup(library),
  });
}
