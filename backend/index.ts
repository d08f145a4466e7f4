export * from './types/index.js';
export * from './utils/errorHandler.js';
export { ExamPdfPipeline } from './services/ExamPdfPipeline.js';
export type { PipelineDependencies } from './services/ExamPdfPipeline.js';
export { ExtractionClient } from './services/ai/ExtractionClient.js';
export { ExtractionClientProvider } from './services/ai/ExtractionClientProvider.js';
export { ModelProvider } from './services/ai/ModelProvider.js';
export type { ChatModel, RetryPolicy } from './services/ai/ModelProvider.js';
export { parseAnswerTable } from './services/parsing/AnswerTableParser.js';
export { matchAnswerToOption } from './services/parsing/AnswerMatcher.js';
export { mergeAnswers, mergeAnswersDetailed, normalizeSubject } from './services/parsing/MergeService.js';
export { createQuestion } from './services/parsing/QuestionFactory.js';
export { segmentText, splitBySubject } from './services/parsing/SubjectSegmenter.js';
export { getParsingConfig } from './config/parsing.js';
export type { ParsingConfig } from './config/parsing.js';
export { createApp } from './server.js';
