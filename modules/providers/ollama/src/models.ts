/**
 * Capstack Ollama Provider — Model Table
 *
 * Llama model names accepted by the stack, and the Ollama tag each runs as.
 */

export const OLLAMA_SUPPORTED_MODELS: Readonly<Record<string, string>> = {
  'Llama3.1-8B-Instruct': 'llama3.1:8b-instruct-fp16',
  'Llama3.1-70B-Instruct': 'llama3.1:70b-instruct-fp16',
  'Llama3.2-1B-Instruct': 'llama3.2:1b-instruct-fp16',
  'Llama3.2-3B-Instruct': 'llama3.2:3b-instruct-fp16',
  'Llama-Guard-3-8B': 'llama-guard3:8b',
  'Llama-Guard-3-1B': 'llama-guard3:1b',
  'Llama3.2-11B-Vision-Instruct': 'x/llama3.2-vision:11b-instruct-fp16',
};

export class ModelTable {
  private readonly toTag: ReadonlyMap<string, string>;
  private readonly toModel: ReadonlyMap<string, string>;

  /** @param extra - additional or overriding name → tag entries */
  constructor(extra: Readonly<Record<string, string>> = {}) {
    this.toTag = new Map(Object.entries({ ...OLLAMA_SUPPORTED_MODELS, ...extra }));
    this.toModel = new Map([...this.toTag].map(([model, tag]) => [tag, model]));
  }

  tagFor(model: string): string | undefined {
    return this.toTag.get(model);
  }

  modelFor(tag: string): string | undefined {
    return this.toModel.get(tag);
  }
}
