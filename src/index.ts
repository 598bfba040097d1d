export { LocationAutocomplete, type AutocompletePhase, type ControllerOptions } from './autocomplete';
export { ATTACHED_FLAG, DEFAULT_VARIANTS, bindAll, mapboxVariant, placesVariant, type ProviderVariant } from './bind';
export {
  CONFIG_ELEMENT_ID,
  DEFAULT_CONFIG,
  loadConfig,
  loadPageConfig,
  type AutocompleteConfig,
  type AutocompleteOptions,
} from './config';
export { MapboxGeocoder, type FetchLike, type MapboxOptions } from './geocode';
export { setLogLevel, type LogLevel } from './logger';
export { PlacesAutocomplete, createPlacesProvider, type PlacesOptions, type PredictionSource } from './places';
export { RequestSequencer } from './sequencer';
export { SuggestionPanel } from './suggestPanel';
export type { AddressComponents, Coordinates, ProviderRecord, SearchProvider, Suggestion } from './types';
