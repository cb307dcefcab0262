/**
 * Capstack Safety Module — Llama Guard Classifier
 *
 * Asks a Llama Guard 3 model, through the stack's inference capability,
 * whether the last message of a conversation is safe. The model answers
 * `safe`, or `unsafe` followed by a line of comma-separated category codes.
 *
 * Only the last message is assessed; earlier turns are context. System
 * messages are left out of the conversation shown to the model.
 */

import { z } from 'zod';
import { AdapterError, RoutingError, describeIssues } from '@capstack/core';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  InvokeOptions,
  Message,
  ShieldVerdict,
  ViolationLevel,
} from '@capstack/core';
import type { ShieldClassifier } from './classifier.js';

export const LLAMA_GUARD_SHIELD_TYPE = 'llama_guard';

export const CANNED_REFUSAL = "I can't answer that. Can I help with something else?";

export const LLAMA_GUARD_CATEGORIES: Readonly<Record<string, string>> = {
  S1: 'Violent Crimes',
  S2: 'Non-Violent Crimes',
  S3: 'Sex Crimes',
  S4: 'Child Exploitation',
  S5: 'Defamation',
  S6: 'Specialized Advice',
  S7: 'Privacy',
  S8: 'Intellectual Property',
  S9: 'Indiscriminate Weapons',
  S10: 'Hate',
  S11: 'Self-Harm',
  S12: 'Sexual Content',
  S13: 'Elections',
  S14: 'Code Interpreter Abuse',
};

export function isLlamaGuardCategory(code: string): boolean {
  return Object.hasOwn(LLAMA_GUARD_CATEGORIES, code);
}

export type ChatCompletion = (
  request: ChatCompletionRequest,
  signal: AbortSignal,
) => Promise<ChatCompletionResponse>;

export interface LlamaGuardOptions {
  readonly model: string;
  readonly excluded_categories: ReadonlyArray<string>;
  /** Level reported for an unsafe assessment. */
  readonly violation_level: Exclude<ViolationLevel, 'none'>;
  readonly chat: ChatCompletion;
}

const LlamaGuardParamsSchema = z.object({
  excluded_categories: z.array(z.string()).optional(),
});

const UNSAFE_RESPONSE = /^unsafe\s*\n\s*([^\n]+)$/;

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

/** Render the moderation prompt. Returns undefined when there is nothing to assess. */
export function buildLlamaGuardPrompt(
  messages: ReadonlyArray<Message>,
  excluded: ReadonlySet<string>,
): string | undefined {
  const conversation = messages.filter((m) => m.role !== 'system');
  const last = conversation.at(-1);
  if (last === undefined) return undefined;

  const agentType = last.role === 'user' ? 'User' : 'Agent';
  const categories = Object.entries(LLAMA_GUARD_CATEGORIES)
    .filter(([code]) => !excluded.has(code))
    .map(([code, name]) => `${code}: ${name}.`)
    .join('\n');
  const turns = conversation
    .map((m) => `${m.role === 'user' ? 'User' : 'Agent'}: ${m.content}`)
    .join('\n\n');

  return [
    `Task: Check if there is unsafe content in '${agentType}' messages in conversations according our safety policy with the below categories.`,
    '',
    '<BEGIN UNSAFE CONTENT CATEGORIES>',
    categories,
    '<END UNSAFE CONTENT CATEGORIES>',
    '',
    '<BEGIN CONVERSATION>',
    '',
    turns,
    '',
    '<END CONVERSATION>',
    '',
    `Provide your safety assessment for ONLY THE LAST ${agentType} message in the above conversation:`,
    " - First line must read 'safe' or 'unsafe'.",
    ' - If unsafe, a second line must include a comma-separated list of violated categories.',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

export class LlamaGuardClassifier implements ShieldClassifier {
  readonly shield_type = LLAMA_GUARD_SHIELD_TYPE;

  constructor(private readonly options: LlamaGuardOptions) {}

  async classify(
    messages: ReadonlyArray<Message>,
    params: Readonly<Record<string, unknown>>,
    invoke: InvokeOptions,
  ): Promise<ReadonlyArray<ShieldVerdict>> {
    const parsed = LlamaGuardParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new RoutingError('InvalidRequest', `Invalid llama_guard params: ${describeIssues(parsed.error)}`);
    }
    const excluded = new Set([...this.options.excluded_categories, ...(parsed.data.excluded_categories ?? [])]);

    const prompt = buildLlamaGuardPrompt(messages, excluded);
    if (prompt === undefined) return [];

    const response = await this.options.chat(
      { model: this.options.model, messages: [{ role: 'user', content: prompt }] },
      invoke.signal,
    );
    const codes = parseAssessment(response.completion_message.content);
    if (codes.length === 0 || codes.every((code) => excluded.has(code))) {
      return [];
    }
    return [
      {
        violation_level: this.options.violation_level,
        user_message: CANNED_REFUSAL,
        metadata: { violation_type: codes.join(',') },
      },
    ];
  }
}

/**
 * Parse the model's answer into violated category codes; `safe` is [].
 *
 * @throws {AdapterError} InvalidResponse when the answer has neither form
 */
export function parseAssessment(text: string): string[] {
  const answer = text.trim();
  if (answer === 'safe') return [];

  const match = UNSAFE_RESPONSE.exec(answer);
  const codes = match?.[1]?.split(',').map((code) => code.trim()) ?? [];
  if (codes.length === 0 || !codes.every(isLlamaGuardCategory)) {
    throw new AdapterError('InvalidResponse', `Unexpected Llama Guard response: ${JSON.stringify(answer)}`, {
      body: text,
    });
  }
  return codes;
}
