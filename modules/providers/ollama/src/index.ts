/**
 * @capstack/provider-ollama
 *
 * Inference provider for an Ollama server.
 */

export { OLLAMA_PROVIDER, OllamaConfigSchema, DEFAULT_OLLAMA_URL, createOllamaAdapter } from './manifest.js';
export type { OllamaBuildOptions, OllamaConfig } from './manifest.js';
export { OllamaInference, samplingOptions, stopReason } from './ollama-inference.js';
export { ModelTable, OLLAMA_SUPPORTED_MODELS } from './models.js';
