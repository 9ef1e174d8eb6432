import { describe, it, expect } from 'vitest';
import {
  AVAILABLE_MODELS,
  DEFAULT_MODEL,
  defaultBaseUrl,
  getModelConfig,
  isValidModel,
  listAvailableModels,
} from '../src/models.js';

describe('model catalog', () => {
  it('lists every model', () => {
    expect(listAvailableModels()).toEqual(['deepseek-reasoner', 'deepseek-chat', 'gpt-4o', 'gpt-4o-mini']);
  });

  it('includes the default model', () => {
    expect(isValidModel(DEFAULT_MODEL)).toBe(true);
    expect(getModelConfig(DEFAULT_MODEL)?.reasoning).toBe(true);
  });

  it('keys each entry by its own name', () => {
    for (const [key, config] of Object.entries(AVAILABLE_MODELS)) {
      expect(config.name).toBe(key);
      expect(config.maxOutputTokens).toBeLessThanOrEqual(config.maxContextLength);
    }
  });

  it('returns null for unknown models', () => {
    expect(getModelConfig('nope')).toBeNull();
    expect(isValidModel('nope')).toBe(false);
  });

  it('maps vendors to endpoints', () => {
    expect(defaultBaseUrl('deepseek-chat')).toBe('https://api.deepseek.com/v1');
    expect(defaultBaseUrl('gpt-4o-mini')).toBe('https://api.openai.com/v1');
    expect(defaultBaseUrl('unknown')).toBe('https://api.deepseek.com/v1');
  });
});
