/**
 * AnswerTableParser
 * Rule-based reader for the rigid answer-key layout: for each subject, blocks of
 * 5 question numbers followed by 5 circled-digit answers, with the subjects
 * interleaved row by row. Returns [] whenever the text does not fit that layout,
 * so the caller can fall back to model extraction.
 */

import type { AnswerRecord } from '../../types/index.js';
import { SUBJECT_NAMES } from '../../config/parsing.js';
import { createLogger } from '../../utils/LoggerUtils.js';
import { CIRCLED_DIGIT_SET } from './AnswerMatcher.js';

const logger = createLogger('ANSWER TABLE');

const GROUP_SIZE = 5;
const BLOCK_SIZE = GROUP_SIZE * 2;
const MIN_SUBJECTS = 2;
const COLUMN_LABELS = new Set(['문제번호', '정답', 'Question No.', 'Answer']);

/**
 * Closed-set subjects present in the text, in order of first appearance.
 * Headers may be letter-spaced.
 */
export function detectSubjects(text: string): string[] {
  const found: Array<{ name: string; index: number }> = [];
  for (const name of SUBJECT_NAMES) {
    const match = new RegExp(Array.from(name).join('\\s*')).exec(text);
    if (match) {
      found.push({ name, index: match.index });
    }
  }
  return found.sort((a, b) => a.index - b.index).map(entry => entry.name);
}

const CIRCLED_RUN = new RegExp(`^[${Array.from(CIRCLED_DIGIT_SET).join('')}]+$`);

function isCell(part: string): boolean {
  return /^\d+$/.test(part) || CIRCLED_DIGIT_SET.has(part);
}

/**
 * Cells of one extracted line. A table row usually comes out as a single line
 * ("1 2 3 4 5", "①②③④⑤"); a line is taken only when every part is a cell.
 */
function lineCells(line: string): string[] {
  const parts = line
    .split(/\s+/)
    .filter(Boolean)
    .flatMap(part => (CIRCLED_RUN.test(part) ? Array.from(part) : [part]));
  return parts.length > 0 && parts.every(isCell) ? parts : [];
}

/**
 * Number and answer cells after the last column label, in reading order.
 */
export function collectTokens(text: string): string[] {
  const lines = text.split('\n').map(line => line.trim());

  let start = 0;
  lines.forEach((line, index) => {
    if (COLUMN_LABELS.has(line)) {
      start = index + 1;
    }
  });

  return lines.slice(start).flatMap(lineCells);
}

function readBlock(block: string[], subject: string, into: AnswerRecord[]): void {
  const numbers = block.slice(0, GROUP_SIZE);
  const answers = block.slice(GROUP_SIZE, BLOCK_SIZE);

  for (let j = 0; j < GROUP_SIZE; j++) {
    const raw = numbers[j];
    if (raw === undefined || !/^\d+$/.test(raw)) {
      continue;
    }
    into.push({
      id: parseInt(raw, 10),
      subject,
      answer: answers[j] ?? '',
      explanation: ''
    });
  }
}

function hasGaplessIds(records: AnswerRecord[], subjects: string[]): boolean {
  for (const subject of subjects) {
    const ids = records.filter(record => record.subject === subject).map(record => record.id);
    const valid = ids.every((id, index) => id === index + 1);
    if (!valid) {
      logger.warn(`${subject}: question numbers out of sequence`, ids.slice(0, 10));
      return false;
    }
  }
  return true;
}

/**
 * Parse the interleaved answer table. All-or-nothing: any inconsistency yields [].
 */
export function parseAnswerTable(text: string): AnswerRecord[] {
  const subjects = detectSubjects(text);
  if (subjects.length < MIN_SUBJECTS) {
    return [];
  }

  const tokens = collectTokens(text);
  if (tokens.length === 0) {
    return [];
  }

  const rowSize = BLOCK_SIZE * subjects.length;
  const records: AnswerRecord[] = [];

  let pos = 0;
  for (; pos + rowSize <= tokens.length; pos += rowSize) {
    subjects.forEach((subject, subjectIndex) => {
      const blockStart = pos + subjectIndex * BLOCK_SIZE;
      readBlock(tokens.slice(blockStart, blockStart + BLOCK_SIZE), subject, records);
    });
  }

  // Short final row: one subject block at a time, as far as the tokens go
  const remaining = tokens.slice(pos);
  for (let subjectIndex = 0; (subjectIndex + 1) * BLOCK_SIZE <= remaining.length && subjectIndex < subjects.length; subjectIndex++) {
    const blockStart = subjectIndex * BLOCK_SIZE;
    readBlock(remaining.slice(blockStart, blockStart + BLOCK_SIZE), subjects[subjectIndex], records);
  }

  // Sanity floor: at least one full block (10 tokens) per subject
  if (records.length * 2 < BLOCK_SIZE * subjects.length) {
    logger.warn(`Only ${records.length} answers recovered for ${subjects.length} subjects`);
    return [];
  }

  if (!hasGaplessIds(records, subjects)) {
    return [];
  }

  logger.success(`Parsed ${records.length} answers (${subjects.length} subjects)`);
  return records;
}
