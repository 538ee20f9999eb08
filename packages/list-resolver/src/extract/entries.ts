/**
 * Pull "<title> (<year>)" entries out of an exported list page.
 */

import * as cheerio from 'cheerio';

import { createLogger } from '../shared/log.js';
import type { TitleEntry } from '../shared/types.js';

const log = createLogger('extract');

const ROW_SELECTOR = 'table[class="ml lists"] tr';
const ENTRY_PATTERN = /^(.*?\S)\s*\((\d{4})\)$/;

export interface ExtractResult {
  entries: Set<TitleEntry>;
  rejected: string[];
  /** Rows seen under the list table, valid or not */
  rows: number;
}

export interface ParsedEntry {
  title: string;
  year: number;
}

export function parseEntry(text: string): ParsedEntry | null {
  const match = ENTRY_PATTERN.exec(text);
  if (!match) return null;
  return { title: match[1], year: Number.parseInt(match[2], 10) };
}

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function extractEntries(html: string): ExtractResult {
  const $ = cheerio.load(html);
  const entries = new Set<TitleEntry>();
  const rejected: string[] = [];
  let rows = 0;

  $(ROW_SELECTOR).each((_, row) => {
    rows++;
    const cell = $(row).children('td').first();
    if (cell.length === 0) return;

    const fullTitle = normalize(cell.text());
    if (parseEntry(fullTitle)) {
      entries.add(fullTitle);
    } else {
      log.warn(`Invalid format for row ${fullTitle}`);
      rejected.push(fullTitle);
    }
  });

  return { entries, rejected, rows };
}
