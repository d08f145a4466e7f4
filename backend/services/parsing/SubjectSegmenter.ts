/**
 * SubjectSegmenter
 * Splits page-tagged document text into subject sections, then chunks oversized
 * sections along page markers so a single model call stays within limits.
 */

import type { PageImage, Section } from '../../types/index.js';
import { EXTRA_SUBJECT_HEADERS, GENERAL_SUBJECT, SUBJECT_NAMES } from '../../config/parsing.js';
import { createLogger } from '../../utils/LoggerUtils.js';

const logger = createLogger('SEGMENTER');

export interface TextSection {
  subjectHint: string;
  text: string;
}

export interface ChunkOptions {
  maxSectionChars: number;
  pagesPerChunk: number;
}

const INLINE_SPACE = '[^\\S\\n]*';

/** "무역규범" -> /무[^\S\n]*역[^\S\n]*규[^\S\n]*범/ ; tolerates letter-spaced headers on one line. */
export function letterSpacedPattern(name: string): string {
  return Array.from(name).join(INLINE_SPACE);
}

function buildHeaderRegex(): RegExp {
  const names = [...SUBJECT_NAMES, ...EXTRA_SUBJECT_HEADERS].map(letterSpacedPattern);
  const ordinals = [`제${INLINE_SPACE}\\d+${INLINE_SPACE}과목`, `제${INLINE_SPACE}\\d+${INLINE_SPACE}교시`];
  return new RegExp(`(${[...names, ...ordinals].join('|')})`, 'g');
}

export function normalizeHeader(raw: string): string {
  return raw.replace(/\s+/g, '');
}

function lastPageMarker(text: string): string | null {
  const markers = text.match(/\[PAGE \d+\]/g);
  return markers ? markers[markers.length - 1] : null;
}

/**
 * Split text at subject headers. Text before the first header belongs to the
 * first section, since headers are sometimes laid out after their content.
 * A section that starts mid-page is prefixed with that page's marker.
 */
export function splitBySubject(text: string): TextSection[] {
  const parts = text.split(buildHeaderRegex());
  if (parts.length < 3) {
    return [{ subjectHint: GENERAL_SUBJECT, text }];
  }

  const sections: TextSection[] = [];
  let preHeader = parts[0].trim();
  let currentPage = lastPageMarker(parts[0]);

  for (let i = 1; i < parts.length; i += 2) {
    const raw = parts[i + 1] ?? '';
    const pageAtHeader = currentPage;
    currentPage = lastPageMarker(raw) ?? currentPage;

    const content = raw.trim();
    // Adjacent headers ("제1과목 무역규범"): the later one names the section
    if (!content) continue;

    let sectionText = preHeader ? `${preHeader}\n${content}` : content;
    if (pageAtHeader && !/^\[PAGE \d+\]/.test(sectionText)) {
      sectionText = `${pageAtHeader}\n${sectionText}`;
    }

    sections.push({ subjectHint: normalizeHeader(parts[i]), text: sectionText });
    preHeader = '';
  }

  if (sections.length === 0) {
    return [{ subjectHint: GENERAL_SUBJECT, text }];
  }

  logger.debug(`Found ${sections.length} subject sections`, sections.map(s => s.subjectHint));
  return sections;
}

/**
 * Split a section into runs of `pagesPerChunk` pages at "[PAGE n]" markers.
 * Text before the first marker stays with the first chunk.
 */
export function chunkByPages(text: string, pagesPerChunk: number): string[] {
  const pages = text.split(/(?=\[PAGE \d+\])/).filter(page => page.trim());
  if (pages.length <= 1) {
    return [text];
  }

  // A leading fragment without a marker joins the page that follows it
  if (!/^\s*\[PAGE \d+\]/.test(pages[0]) && pages.length > 1) {
    pages.splice(0, 2, pages[0] + pages[1]);
  }

  const chunks: string[] = [];
  for (let i = 0; i < pages.length; i += pagesPerChunk) {
    chunks.push(pages.slice(i, i + pagesPerChunk).join('').trim());
  }
  return chunks;
}

/**
 * Full text segmentation: subject split, then page chunking of oversized sections.
 */
export function segmentText(text: string, options: ChunkOptions): Section[] {
  const sections: Section[] = [];

  for (const { subjectHint, text: sectionText } of splitBySubject(text)) {
    if (sectionText.length <= options.maxSectionChars) {
      sections.push({ subjectHint, label: subjectHint, payload: { kind: 'text', text: sectionText } });
      continue;
    }

    const chunks = chunkByPages(sectionText, options.pagesPerChunk);
    logger.info(`${subjectHint}: ${sectionText.length} chars -> ${chunks.length} chunks`);
    chunks.forEach((chunk, index) => {
      sections.push({
        subjectHint,
        label: chunks.length > 1 ? `${subjectHint} (${index + 1}/${chunks.length})` : subjectHint,
        payload: { kind: 'text', text: chunk }
      });
    });
  }

  return sections;
}

/**
 * Vision mode has no text to split on, so sections are fixed-size page groups.
 */
export function groupPages(pages: PageImage[], pagesPerGroup: number): Section[] {
  const sections: Section[] = [];
  for (let i = 0; i < pages.length; i += pagesPerGroup) {
    const group = pages.slice(i, i + pagesPerGroup);
    const first = group[0].pageNumber;
    const last = group[group.length - 1].pageNumber;
    sections.push({
      subjectHint: GENERAL_SUBJECT,
      label: first === last ? `page ${first}` : `pages ${first}-${last}`,
      payload: { kind: 'images', pages: group }
    });
  }
  return sections;
}
