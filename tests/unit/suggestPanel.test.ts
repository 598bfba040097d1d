/**
 * Unit tests for the suggestion panel renderer
 */

import { describe, expect, it, vi } from 'vitest';
import { SuggestionPanel } from '../../src/suggestPanel';
import type { Suggestion } from '../../src/types';
import { pointerDown, rowLabels } from '../helpers/dom';

function suggestions(...labels: string[]): Suggestion[] {
  return labels.map((label) => ({ label, raw: { label } }));
}

describe('SuggestionPanel', () => {
  it('starts hidden and closed', () => {
    const panel = new SuggestionPanel(document, vi.fn());

    expect(panel.element.hidden).toBe(true);
    expect(panel.isOpen).toBe(false);
    expect(panel.element.getAttribute('role')).toBe('listbox');
  });

  it('renders one row per suggestion in provider order, duplicates included', () => {
    const panel = new SuggestionPanel(document, vi.fn());

    panel.render(suggestions('B Street', 'A Street', 'B Street'));

    expect(rowLabels(panel.element)).toEqual(['B Street', 'A Street', 'B Street']);
    expect(panel.isOpen).toBe(true);
    expect(panel.rows[1].getAttribute('role')).toBe('option');
    expect(panel.rows[1].id).toBe(`${panel.element.id}-1`);
  });

  it('replaces previous rows on every render', () => {
    const panel = new SuggestionPanel(document, vi.fn());

    panel.render(suggestions('Old 1', 'Old 2'));
    panel.render(suggestions('New'));

    expect(rowLabels(panel.element)).toEqual(['New']);
  });

  it('stays hidden for an empty list', () => {
    const panel = new SuggestionPanel(document, vi.fn());

    panel.render(suggestions('Something'));
    panel.render([]);

    expect(panel.element.hidden).toBe(true);
    expect(panel.element.childElementCount).toBe(0);
    expect(panel.isOpen).toBe(false);
  });

  it('selects on mousedown and cancels the default focus change', () => {
    const onSelect = vi.fn();
    const panel = new SuggestionPanel(document, onSelect);
    const items = suggestions('First', 'Second');
    panel.render(items);

    const event = new MouseEvent('mousedown', { bubbles: true, cancelable: true });
    panel.rows[1].dispatchEvent(event);

    expect(onSelect).toHaveBeenCalledWith(items[1]);
    expect(event.defaultPrevented).toBe(true);
  });

  it('highlights the hovered row', () => {
    const panel = new SuggestionPanel(document, vi.fn());
    panel.render(suggestions('First', 'Second'));

    panel.rows[1].dispatchEvent(new MouseEvent('mouseenter'));

    expect(panel.rows[1].classList.contains('is-active')).toBe(true);
    expect(panel.rows[0].classList.contains('is-active')).toBe(false);
    expect(panel.activeId).toBe(panel.rows[1].id);
  });

  it('moves the active row within bounds and selects it', () => {
    const onSelect = vi.fn();
    const panel = new SuggestionPanel(document, onSelect);
    const items = suggestions('First', 'Second');
    panel.render(items);

    expect(panel.selectActive()).toBe(false);
    panel.move(1);
    panel.move(1);
    panel.move(1);
    expect(panel.activeId).toBe(panel.rows[1].id);
    panel.move(-1);
    expect(panel.rows[0].getAttribute('aria-selected')).toBe('true');

    expect(panel.selectActive()).toBe(true);
    expect(onSelect).toHaveBeenCalledWith(items[0]);
  });

  it('ignores a mousedown on a row after the panel closed', () => {
    const onSelect = vi.fn();
    const panel = new SuggestionPanel(document, onSelect);
    panel.render(suggestions('First'));
    const row = panel.rows[0];

    panel.close();
    pointerDown(row);

    expect(onSelect).not.toHaveBeenCalled();
  });
});
