/**
 * AI Model Configuration for the extraction pipeline
 * Centralized configuration for all supported AI models
 */

import { ModelType, AIModelConfig } from '../types/index.js';

/**
 * Configuration for all supported AI models
 */
export const AI_MODELS: Record<ModelType, AIModelConfig> = {
  'openai-gpt-4o': {
    name: 'OpenAI GPT-4o',
    apiEndpoint: 'openai', // Special marker for OpenAI provider
    maxTokens: 16384,
    temperature: 0.1
  },
  'openai-gpt-4o-mini': {
    name: 'OpenAI GPT-4o Mini',
    apiEndpoint: 'openai',
    maxTokens: 16384,
    temperature: 0.1
  },
  'gemini-2.0-flash': {
    name: 'Google Gemini 2.0 Flash',
    apiEndpoint: 'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent',
    maxTokens: 64000,
    temperature: 0.1
  },
  'gemini-2.5-flash': {
    name: 'Google Gemini 2.5 Flash',
    apiEndpoint: 'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent',
    maxTokens: 64000,
    temperature: 0.1
  }
};

/**
 * Get configuration for a specific model
 * @throws Error if model type is not supported
 */
export function getModelConfig(modelType: ModelType): AIModelConfig {
  const config = AI_MODELS[modelType];
  if (!config) {
    throw new Error(`Unsupported model type: ${modelType}`);
  }
  return config;
}

/**
 * Get the default model (from env or default)
 */
export function getDefaultModel(): ModelType {
  const fromEnv = process.env.EXTRACTION_MODEL;
  return fromEnv && isModelSupported(fromEnv) ? fromEnv : 'openai-gpt-4o';
}

/**
 * Check if a model is supported
 */
export function isModelSupported(model: string): model is ModelType {
  return Object.prototype.hasOwnProperty.call(AI_MODELS, model);
}

export function isOpenAIModel(model: ModelType): boolean {
  return getModelConfig(model).apiEndpoint === 'openai';
}

/** OpenAI model name for a model id ('openai-gpt-4o' -> 'gpt-4o') */
export function getOpenAIModelName(model: ModelType): string {
  return model.replace('openai-', '');
}

/** Get OpenAI API endpoint for chat completions */
export function getOpenAIEndpoint(): string {
  return process.env.OPENAI_API_BASE || 'https://api.openai.com/v1/chat/completions';
}
