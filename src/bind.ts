import { LocationAutocomplete } from './autocomplete';
import { loadConfig, type AutocompleteConfig, type AutocompleteOptions } from './config';
import { MapboxGeocoder } from './geocode';
import { debug, error, errorMessage, setLogLevel } from './logger';
import { createPlacesProvider } from './places';
import type { SearchProvider } from './types';

/** dataset key of `data-autocomplete-attached`; set once, never cleared. */
export const ATTACHED_FLAG = 'autocompleteAttached';

export interface ProviderVariant {
  readonly name: string;
  readonly selector: string;
  /** Returns undefined when the page lacks what the provider needs. */
  createProvider(config: AutocompleteConfig): SearchProvider | undefined;
}

export const mapboxVariant: ProviderVariant = {
  name: 'mapbox',
  selector: 'input[data-autocomplete="location"]',
  createProvider(config) {
    if (!config.providerCredential) return undefined;
    return new MapboxGeocoder({
      accessToken: config.providerCredential,
      limit: config.limit,
      countries: config.countries,
      timeoutMs: config.requestTimeoutMs,
    });
  },
};

export const placesVariant: ProviderVariant = {
  name: 'places',
  selector: 'input.js-places-autocomplete',
  createProvider: (config) => createPlacesProvider(config),
};

export const DEFAULT_VARIANTS: readonly ProviderVariant[] = [mapboxVariant, placesVariant];

/**
 * Attaches an autocomplete controller to every marked input under `root` that
 * does not have one yet. Safe to call again after inserting markup.
 */
export function bindAll(
  root: ParentNode,
  options: AutocompleteOptions = {},
  variants: readonly ProviderVariant[] = DEFAULT_VARIANTS,
): void {
  const config = loadConfig(options);
  if (options.logLevel) setLogLevel(config.logLevel);

  for (const variant of variants) {
    const inputs = Array.from(root.querySelectorAll<HTMLInputElement>(variant.selector)).filter(
      (input) => input.dataset[ATTACHED_FLAG] !== '1',
    );
    if (!inputs.length) continue;

    let provider: SearchProvider | undefined;
    try {
      provider = variant.createProvider(config);
    } catch (err) {
      error('Autocomplete provider failed to initialize', { variant: variant.name, error: errorMessage(err) });
      continue;
    }
    if (!provider) {
      debug('Autocomplete provider not configured, skipping', { variant: variant.name, inputs: inputs.length });
      continue;
    }

    for (const input of inputs) {
      input.dataset[ATTACHED_FLAG] = '1';
      new LocationAutocomplete(input, provider, {
        debounceMs: config.debounceMs,
        blurGraceMs: config.blurGraceMs,
      });
    }
  }
}
