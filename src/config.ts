import { z } from 'zod';
import { errorMessage, warn } from './logger';

export const CONFIG_ELEMENT_ID = 'location-autocomplete-config';

const configSchema = z.object({
  // Public Mapbox token; blank means "not configured".
  providerCredential: z
    .string()
    .trim()
    .nullish()
    .transform((v) => v || undefined),
  debounceMs: z.number().int().nonnegative().default(200),
  blurGraceMs: z.number().int().nonnegative().default(120),
  limit: z.number().int().min(1).max(10).default(6),
  countries: z.array(z.string().length(2)).default(['CA', 'US']),
  requestTimeoutMs: z.number().int().positive().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type AutocompleteConfig = z.output<typeof configSchema>;
export type AutocompleteOptions = z.input<typeof configSchema>;

export const DEFAULT_CONFIG: AutocompleteConfig = configSchema.parse({});

/**
 * Parses `input`, replacing each invalid top-level field with its default.
 */
export function loadConfig(input: unknown): AutocompleteConfig {
  const result = configSchema.safeParse(input ?? {});
  if (result.success) return result.data;
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    warn('Autocomplete config is not an object, using defaults');
    return DEFAULT_CONFIG;
  }
  const { fieldErrors } = result.error.flatten();
  warn('Invalid autocomplete config fields, using their defaults', { fieldErrors });
  const valid = Object.fromEntries(Object.entries(input).filter(([key]) => !(key in fieldErrors)));
  const retry = configSchema.safeParse(valid);
  return retry.success ? retry.data : DEFAULT_CONFIG;
}

/**
 * Reads `<script type="application/json" id="location-autocomplete-config">`.
 */
export function loadPageConfig(doc: Document): AutocompleteConfig {
  const text = doc.getElementById(CONFIG_ELEMENT_ID)?.textContent?.trim();
  if (!text) return loadConfig({});
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    warn('Unreadable autocomplete config', { error: errorMessage(err) });
    parsed = {};
  }
  return loadConfig(parsed);
}
