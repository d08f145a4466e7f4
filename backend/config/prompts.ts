/**
 * Centralized AI Prompts Configuration
 *
 * All prompts used by the extraction client live here or under ./prompts.
 */

import questionExtractionSystemPrompt from './prompts/question_extraction_system_prompt.js';
import answerExtractionSystemPrompt from './prompts/answer_extraction_system_prompt.js';

const fill = (template: string, values: Record<string, string>): string =>
  template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);

export const AI_PROMPTS = {
  // ============================================================================
  // QUESTION EXTRACTION
  // ============================================================================

  questionExtraction: {
    textSystem: fill(questionExtractionSystemPrompt, { SOURCE: '페이지 텍스트' }),
    visionSystem: fill(questionExtractionSystemPrompt, { SOURCE: '페이지 이미지' }),

    textUser: (sectionLabel: string, text: string) =>
      `현재 분석 중인 구역: ${sectionLabel}\n각 페이지는 [PAGE n] 표시로 시작한다. 모든 문제를 추출하라.\n\n텍스트 내용:\n${text}`,

    visionUser: (pageNumbers: number[]) =>
      `다음은 시험지 페이지 [${pageNumbers.join(', ')}]의 이미지다. 모든 문제를 추출하라.`
  },

  // ============================================================================
  // ANSWER KEY EXTRACTION
  // ============================================================================

  answerExtraction: {
    system: answerExtractionSystemPrompt,

    user: (subjectHint: string, text: string) =>
      `현재 분석 중인 답안 구역: ${subjectHint}\n\n텍스트 내용:\n${text}`
  },

  /** Appended to the system prompt when the first response was not valid JSON. */
  strictJsonSuffix: '\n\n⚠️ 반드시 유효한 JSON 객체만 반환하라. 다른 텍스트는 절대 포함하지 마라.'
};
