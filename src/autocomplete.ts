import { errorMessage, withContext, type Logger } from './logger';
import { RequestSequencer } from './sequencer';
import { SuggestionPanel } from './suggestPanel';
import type { AddressComponents, Coordinates, ProviderRecord, SearchProvider, Suggestion } from './types';

export type AutocompletePhase = 'idle' | 'pending' | 'searching' | 'open';

export interface ControllerOptions {
  debounceMs: number;
  blurGraceMs: number;
}

type FieldElement = HTMLInputElement | HTMLSelectElement | HTMLTextAreaElement;

// [field, dataset key]: data-city-target="<id>" names the field receiving the locality
const TARGET_KEYS = [
  ['city', 'cityTarget'],
  ['province', 'provinceTarget'],
  ['lat', 'latTarget'],
  ['lon', 'lonTarget'],
] as const;

type Targets = Partial<Record<(typeof TARGET_KEYS)[number][0], FieldElement>>;

function isField(el: Element | null): el is FieldElement {
  return el instanceof HTMLInputElement || el instanceof HTMLSelectElement || el instanceof HTMLTextAreaElement;
}

function writeField(field: FieldElement | undefined, value: string | undefined): void {
  if (!field || !value) return;
  field.value = value;
  field.dispatchEvent(new Event('change', { bubbles: true }));
}

/**
 * Drives one input: debounced lookups, the suggestion panel, selection and dismissal.
 */
export class LocationAutocomplete {
  readonly panel: SuggestionPanel;
  private readonly sequencer: RequestSequencer<Suggestion[]>;
  private readonly log: Logger;
  private lastQuery = '';
  private blurTimer: ReturnType<typeof setTimeout> | undefined;
  private selection = 0;

  constructor(
    readonly input: HTMLInputElement,
    private readonly provider: SearchProvider,
    private readonly options: ControllerOptions,
  ) {
    this.log = withContext({ provider: provider.name, input: input.id || input.name });
    this.panel = new SuggestionPanel(input.ownerDocument, (s) => this.select(s));
    this.sequencer = new RequestSequencer(options.debounceMs, {
      search: (q) => this.fetchSuggestions(q),
      onResult: (suggestions, q) => {
        this.log.debug('Suggestions received', { query: q, count: suggestions.length });
        this.panel.render(suggestions);
        this.syncAria();
      },
      onError: (err, q) => {
        this.log.warn('Location search failed', { query: q, error: errorMessage(err) });
        this.panel.close();
        this.syncAria();
      },
    });
    this.mount();
  }

  get phase(): AutocompletePhase {
    if (this.sequencer.isPending) return 'pending';
    if (this.sequencer.isSearching) return 'searching';
    if (this.panel.isOpen) return 'open';
    return 'idle';
  }

  close(): void {
    this.sequencer.invalidate();
    this.panel.close();
    this.syncAria();
  }

  private mount(): void {
    const { input } = this;
    input.setAttribute('autocomplete', 'off');
    input.setAttribute('role', 'combobox');
    input.setAttribute('aria-autocomplete', 'list');
    input.setAttribute('aria-controls', this.panel.element.id);
    input.setAttribute('aria-expanded', 'false');

    // relative wrapper so the absolutely positioned panel sizes to the input
    const parent = input.parentNode;
    if (parent) {
      const wrap = input.ownerDocument.createElement('div');
      wrap.className = 'autocomplete-wrap';
      wrap.style.position = 'relative';
      parent.insertBefore(wrap, input);
      wrap.appendChild(input);
      wrap.appendChild(this.panel.element);
    }

    input.addEventListener('input', () => this.onInput());
    input.addEventListener('keydown', (e) => this.onKeydown(e));
    input.addEventListener('blur', () => this.onBlur());
    input.addEventListener('focus', () => this.cancelBlur());
  }

  private onInput(): void {
    const q = this.input.value.trim();
    if (q === this.lastQuery) return;
    this.lastQuery = q;
    // new text supersedes a details lookup still pending for the last selection
    this.selection++;
    this.panel.clearActive();
    this.syncAria();
    if (!q) {
      this.close();
      return;
    }
    this.sequencer.schedule(q);
  }

  private onKeydown(e: KeyboardEvent): void {
    switch (e.key) {
      case 'Escape':
        if (this.panel.isOpen) e.preventDefault();
        this.close();
        break;
      case 'ArrowDown':
      case 'ArrowUp':
        if (!this.panel.isOpen) return;
        e.preventDefault();
        this.panel.move(e.key === 'ArrowDown' ? 1 : -1);
        this.syncAria();
        break;
      case 'Enter':
        if (this.panel.isOpen && this.panel.selectActive()) e.preventDefault();
        break;
    }
  }

  private onBlur(): void {
    this.cancelBlur();
    this.blurTimer = setTimeout(() => {
      this.blurTimer = undefined;
      this.close();
    }, this.options.blurGraceMs);
  }

  private cancelBlur(): void {
    if (this.blurTimer === undefined) return;
    clearTimeout(this.blurTimer);
    this.blurTimer = undefined;
  }

  private async fetchSuggestions(query: string): Promise<Suggestion[]> {
    const records = await this.provider.search(query);
    return Array.from(records, (raw) => Object.freeze({ label: raw.label, raw }));
  }

  private select(suggestion: Suggestion): void {
    const selection = ++this.selection;
    this.input.value = suggestion.label;
    this.lastQuery = suggestion.label.trim();
    this.close();
    this.input.dispatchEvent(new Event('change', { bubbles: true }));

    const targets = this.targets();
    const { components, coords } = suggestion.raw;
    this.fill(targets, components, coords);
    if (!components && (targets.city || targets.province)) {
      void this.resolveComponents(suggestion.raw, targets, selection);
    }
  }

  private async resolveComponents(record: ProviderRecord, targets: Targets, selection: number): Promise<void> {
    if (!this.provider.resolve) return;
    try {
      const components = await this.provider.resolve(record);
      if (selection !== this.selection) return;
      this.fill(targets, components);
    } catch (err) {
      this.log.warn('Place details lookup failed', { id: record.id, error: errorMessage(err) });
    }
  }

  private targets(): Targets {
    const doc = this.input.ownerDocument;
    const targets: Targets = {};
    for (const [name, key] of TARGET_KEYS) {
      const id = this.input.dataset[key];
      const el = id ? doc.getElementById(id) : null;
      if (isField(el)) targets[name] = el;
    }
    return targets;
  }

  private fill(targets: Targets, components?: AddressComponents, coords?: Coordinates): void {
    writeField(targets.city, components?.locality);
    writeField(targets.province, components?.region);
    if (coords) {
      writeField(targets.lat, String(coords.lat));
      writeField(targets.lon, String(coords.lon));
    }
  }

  private syncAria(): void {
    this.input.setAttribute('aria-expanded', String(this.panel.isOpen));
    const active = this.panel.activeId;
    if (active) this.input.setAttribute('aria-activedescendant', active);
    else this.input.removeAttribute('aria-activedescendant');
  }
}
