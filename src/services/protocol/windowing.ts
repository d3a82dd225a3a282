/**
 * Page Windowing
 *
 * Pure functions: identical inputs always yield identical output.
 *
 * @module services/protocol/windowing
 */

import type { Page } from '../../models/protocol.js';

/** Separator between page texts inside a window */
export const PAGE_SEPARATOR = '\n\n';

export interface TextWindow {
  text: string;
  center: number;
  /** Page indices that contributed non-empty text, ascending */
  pages: number[];
}

/**
 * Concatenate the text of pages within [center - span, center + span],
 * clipped to the pages that exist, in index order.
 *
 * span = 0 yields the center page alone. With no pages, or no text in range,
 * the text is empty and the center is returned unchanged.
 */
export function buildWindow(pages: readonly Page[], center: number, span: number): TextWindow {
  const half = Math.max(0, Math.floor(span));
  const start = center - half;
  const end = center + half;

  const inRange = pages
    .filter((p) => p.index >= start && p.index <= end)
    .sort((a, b) => a.index - b.index);

  const chunks: string[] = [];
  const used: number[] = [];
  for (const page of inRange) {
    const text = page.text.trim();
    if (text) {
      chunks.push(text);
      used.push(page.index);
    }
  }

  return { text: chunks.join(PAGE_SEPARATOR), center, pages: used };
}

/**
 * Expand each seed index by ±span and clip to the document's page indices.
 * Returns a sorted, de-duplicated list. For a fixed seed set, the result at
 * span s+1 is always a superset of the result at span s.
 */
export function expandSeedPages(seeds: readonly number[], span: number, pages: readonly Page[]): number[] {
  const half = Math.max(0, Math.floor(span));
  const valid = new Set(pages.map((p) => p.index));
  const out = new Set<number>();

  for (const seed of seeds) {
    for (let idx = seed - half; idx <= seed + half; idx++) {
      if (valid.has(idx)) out.add(idx);
    }
  }

  return [...out].sort((a, b) => a - b);
}
