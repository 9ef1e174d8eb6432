export type ModelVendor = 'deepseek' | 'openai';

export interface ModelConfig {
  name: string;
  vendor: ModelVendor;
  maxContextLength: number;
  maxOutputTokens: number;
  /** Streams a separate reasoning channel alongside the answer. */
  reasoning: boolean;
}

const VENDOR_BASE_URLS: Record<ModelVendor, string> = {
  deepseek: 'https://api.deepseek.com/v1',
  openai: 'https://api.openai.com/v1',
};

export const AVAILABLE_MODELS: Record<string, ModelConfig> = {
  'deepseek-reasoner': {
    name: 'deepseek-reasoner',
    vendor: 'deepseek',
    maxContextLength: 65536,
    maxOutputTokens: 64000,
    reasoning: true,
  },
  'deepseek-chat': {
    name: 'deepseek-chat',
    vendor: 'deepseek',
    maxContextLength: 65536,
    maxOutputTokens: 8192,
    reasoning: false,
  },
  'gpt-4o': {
    name: 'gpt-4o',
    vendor: 'openai',
    maxContextLength: 128000,
    maxOutputTokens: 16384,
    reasoning: false,
  },
  'gpt-4o-mini': {
    name: 'gpt-4o-mini',
    vendor: 'openai',
    maxContextLength: 128000,
    maxOutputTokens: 16384,
    reasoning: false,
  },
};

export const DEFAULT_MODEL = 'deepseek-reasoner';

export function isValidModel(modelName: string): boolean {
  return Object.hasOwn(AVAILABLE_MODELS, modelName);
}

export function getModelConfig(modelName: string): ModelConfig | null {
  return isValidModel(modelName) ? AVAILABLE_MODELS[modelName] : null;
}

export function listAvailableModels(): string[] {
  return Object.keys(AVAILABLE_MODELS);
}

export function defaultBaseUrl(modelName: string): string {
  const vendor = getModelConfig(modelName)?.vendor ?? 'deepseek';
  return VENDOR_BASE_URLS[vendor];
}
