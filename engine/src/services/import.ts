/**
 * OCR import: turn recognized lines from a textbook page into grouped words.
 *
 * Coordinates are normalized (0..1) with a bottom-left origin. The page is
 * split into columns by x, each column is read top to bottom, and short
 * capitalized lines set the group for the items that follow them.
 */

import type { Language } from '../types';
import type { CardStore } from './card-store';

export const UNGROUPED = 'Ungrouped';
export const TRANSLATION_CHUNK_SIZE = 25;
const COLUMN_THRESHOLD = 0.08;

export interface OcrLine {
  text: string;
  bbox: { x: number; y: number; w: number; h: number };
  confidence?: number;
}

export interface ImportItem {
  text: string;
  group: string;
}

export interface ParseOptions {
  initialGroup?: string | null;
  minConfidence?: number;
}

/**
 * Translation provider. Returns one translation per input text, in order.
 */
export interface Translator {
  translate(texts: string[], source: Language, target: Language): Promise<string[]>;
}

export interface ImportFromOcrInput {
  lines: OcrLine[];
  chapter: string;
  language?: Language;
  translator?: Translator;
  initialGroup?: string | null;
  minConfidence?: number;
}

export interface ImportResult {
  inserted: number;
  skipped: number;
}

interface LineEntry {
  text: string;
  x: number;
  yTop: number;
  height: number;
}

interface Column {
  center: number;
  lines: LineEntry[];
}

function looksLikeChapterLine(text: string): boolean {
  const lowered = text.toLowerCase();
  if (lowered.includes('hoofdstuk') || lowered.includes('chapter')) {
    return true;
  }
  // Common OCR misreadings of "hoofdstuk"
  return lowered.startsWith('hoo') && lowered.includes('stuk');
}

function looksLikePageNumber(text: string): boolean {
  return /^\d+$/.test(text);
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function splitIntoColumns(entries: LineEntry[]): LineEntry[][] {
  const columns: Column[] = [];
  const byX = [...entries].sort((a, b) => a.x - b.x);

  for (const entry of byX) {
    let best: Column | undefined;
    let bestDistance = Infinity;
    for (const column of columns) {
      const distance = Math.abs(entry.x - column.center);
      if (distance < bestDistance) {
        bestDistance = distance;
        best = column;
      }
    }
    if (best && bestDistance <= COLUMN_THRESHOLD) {
      const count = best.lines.length;
      best.center = (best.center * count + entry.x) / (count + 1);
      best.lines.push(entry);
    } else {
      columns.push({ center: entry.x, lines: [entry] });
    }
  }

  return columns.sort((a, b) => a.center - b.center).map(column => column.lines);
}

export function isHeading(text: string, height: number, medianHeight: number): boolean {
  const trimmed = text.trim();
  if (trimmed === '' || /[,\-()]/.test(trimmed)) {
    return false;
  }
  const [first, ...rest] = [...trimmed];
  if (!/\p{Lu}/u.test(first) || rest.some(char => /\p{Lu}/u.test(char))) {
    return false;
  }
  if (medianHeight <= 0) {
    return false;
  }
  return trimmed.includes(' ') ? height >= medianHeight * 1.15 : height >= medianHeight * 0.8;
}

export function normalizeHeading(text: string): string {
  return text.replace(/:+$/, '').trim();
}

export function normalizeItemText(text: string): string {
  let trimmed = text.trim();
  if (trimmed.startsWith('- ')) {
    trimmed = trimmed.slice(2);
  }
  return trimmed.trim().replaceAll('.', ',');
}

/**
 * Parse OCR lines into items tagged with the group heading above them.
 */
export function parseGroupedItems(lines: OcrLine[], options: ParseOptions = {}): ImportItem[] {
  const minConfidence = options.minConfidence ?? 0;
  const entries: LineEntry[] = [];
  for (const line of lines) {
    const text = line.text.trim();
    if (text === '' || looksLikeChapterLine(text) || looksLikePageNumber(text)) {
      continue;
    }
    if (line.confidence !== undefined && line.confidence < minConfidence) {
      continue;
    }
    entries.push({
      text,
      x: line.bbox.x,
      yTop: 1 - (line.bbox.y + line.bbox.h),
      height: line.bbox.h,
    });
  }
  if (entries.length === 0) {
    return [];
  }

  const medianHeight = median(entries.map(entry => entry.height));
  let currentGroup = options.initialGroup ?? null;
  const items: ImportItem[] = [];

  for (const column of splitIntoColumns(entries)) {
    column.sort((a, b) => a.yTop - b.yTop);
    for (const entry of column) {
      const normalized = normalizeItemText(entry.text);
      if (normalized === '') continue;
      if (isHeading(entry.text, entry.height, medianHeight)) {
        currentGroup = normalizeHeading(normalized);
        continue;
      }
      items.push({ text: normalized, group: currentGroup ?? UNGROUPED });
    }
  }

  return items;
}

function otherLanguage(language: Language): Language {
  return language === 'Dutch' ? 'English' : 'Dutch';
}

/**
 * Parse, translate and store a page of OCR lines. Words that already exist
 * for the language are skipped. Each word is created with its card through
 * the store.
 */
export async function importFromOcr(store: CardStore, input: ImportFromOcrInput): Promise<ImportResult> {
  const language = input.language ?? 'Dutch';
  const chapter = input.chapter.trim();
  const initialGroup =
    input.initialGroup !== undefined ? input.initialGroup : await store.lastGroupForChapter(chapter);

  const items = parseGroupedItems(input.lines, { initialGroup, minConfidence: input.minConfidence });
  let inserted = 0;
  let skipped = 0;

  for (let index = 0; index < items.length; index += TRANSLATION_CHUNK_SIZE) {
    const chunk = items.slice(index, index + TRANSLATION_CHUNK_SIZE);
    const translations = input.translator
      ? await input.translator.translate(
          chunk.map(item => item.text),
          language,
          otherLanguage(language)
        )
      : [];

    for (const [offset, item] of chunk.entries()) {
      if (await store.exists(item.text, language)) {
        skipped++;
        continue;
      }
      await store.create({
        text: item.text,
        translation: translations[offset] ?? null,
        language,
        chapter: chapter === '' ? null : chapter,
        group_name: item.group,
      });
      inserted++;
    }
  }

  if (skipped > 0) {
    console.log(`[import] skipped ${skipped} duplicate words`);
  }
  console.log(`[import] inserted ${inserted} words into chapter "${chapter}"`);
  return { inserted, skipped };
}
