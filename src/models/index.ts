export { createAdapter, adapterFactory } from './provider.js';
export { OpenAIAdapter, OPENAI_BASE_URL, DEFAULT_TIMEOUT_MS, type AdapterOptions } from './openai.js';
export { AnthropicAdapter, ANTHROPIC_BASE_URL, ANTHROPIC_API_VERSION, toAnthropicMessages } from './anthropic.js';
export { OpenRouterAdapter, OPENROUTER_BASE_URL, OPENROUTER_DEFAULT_HEADERS } from './openrouter.js';
export { ZaiAdapter, ZAI_BASE_URL } from './zai.js';
export { OPTION_SCHEMAS, allowedOptionsFor, filterOptions, type FilteredOptions } from './options.js';
export { postJson, type PostJsonOptions } from './http.js';
