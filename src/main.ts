/**
 * Location autocomplete — page entry
 * - esbuild bundled into an IIFE (global `LocationAutocomplete`)
 * - config from <script type="application/json" id="location-autocomplete-config">
 * - `LocationAutocomplete.init()` again after inserting marked inputs; bound ones are skipped
 */

import { bindAll } from './bind';
import { loadPageConfig } from './config';

export { bindAll };

export function init(doc: Document = document): void {
  bindAll(doc, loadPageConfig(doc));
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', () => init());
} else {
  init();
}
