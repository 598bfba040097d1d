import type { Suggestion } from './types';

let panelSeq = 0;

/**
 * Listbox of suggestion rows. Every render replaces all rows; the panel is open
 * exactly when it is unhidden and holds at least one row.
 */
export class SuggestionPanel {
  readonly element: HTMLDivElement;
  private items: readonly Suggestion[] = [];
  private activeIndex = -1;

  constructor(
    doc: Document,
    private readonly onSelect: (suggestion: Suggestion) => void,
  ) {
    const el = doc.createElement('div');
    el.id = `location-suggest-${++panelSeq}`;
    el.className = 'autocomplete-menu';
    el.setAttribute('role', 'listbox');
    el.hidden = true;
    Object.assign(el.style, {
      position: 'absolute',
      zIndex: '2000',
      width: '100%',
      maxHeight: '240px',
      overflowY: 'auto',
    });
    this.element = el;
  }

  get isOpen(): boolean {
    return !this.element.hidden && this.element.childElementCount > 0;
  }

  get rows(): HTMLElement[] {
    return Array.from(this.element.querySelectorAll<HTMLElement>('.autocomplete-item'));
  }

  /** Id of the highlighted row, if any. */
  get activeId(): string | undefined {
    return this.rows[this.activeIndex]?.id;
  }

  render(suggestions: readonly Suggestion[]): void {
    this.close();
    if (!suggestions.length) return;
    this.items = suggestions;
    const doc = this.element.ownerDocument;
    suggestions.forEach((suggestion, idx) => {
      const row = doc.createElement('div');
      row.id = `${this.element.id}-${idx}`;
      row.className = 'autocomplete-item';
      row.setAttribute('role', 'option');
      row.textContent = suggestion.label;
      // mousedown lands before the blur of the same press; preventDefault keeps focus in the input
      row.addEventListener('mousedown', (e) => {
        e.preventDefault();
        this.select(idx);
      });
      row.addEventListener('mouseenter', () => this.highlight(idx));
      this.element.appendChild(row);
    });
    this.element.hidden = false;
  }

  close(): void {
    this.element.innerHTML = '';
    this.element.hidden = true;
    this.items = [];
    this.activeIndex = -1;
  }

  move(delta: number): void {
    if (!this.isOpen) return;
    const last = this.items.length - 1;
    this.highlight(Math.max(0, Math.min(this.activeIndex + delta, last)));
  }

  clearActive(): void {
    this.highlight(-1);
  }

  /** Returns false when no row is highlighted. */
  selectActive(): boolean {
    if (this.activeIndex < 0) return false;
    this.select(this.activeIndex);
    return true;
  }

  private highlight(idx: number): void {
    this.activeIndex = idx;
    this.rows.forEach((row, i) => {
      row.classList.toggle('is-active', i === idx);
      row.setAttribute('aria-selected', String(i === idx));
    });
  }

  private select(idx: number): void {
    const suggestion = this.items[idx];
    if (suggestion) this.onSelect(suggestion);
  }
}
