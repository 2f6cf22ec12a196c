/**
 * Text Generation Service
 *
 * Thin client over the OpenAI chat completions endpoint plus the prompts the
 * research core needs. complete() never throws: any provider error is logged
 * and surfaces as an empty string, which callers treat as "no answer".
 */

import { fetchJson } from '@/utils/http';
import { createLogger } from '@/utils/logger';
import { errorMessage } from '@/errors/research';
import { heuristicCredibility } from '@/services/credibility';
import type { ConversationTurn } from '@/types/research';

const log = createLogger('llm');

export interface TextGenerator {
  complete(prompt: string, jsonMode: boolean): Promise<string>;
}

export interface OpenAiChatOptions {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchFn?: typeof globalThis.fetch;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

export const SEMANTIC_DIFF_UNAVAILABLE = 'Semantic diff unavailable: the comparison model returned no answer.';
const SUMMARY_UNAVAILABLE = 'Summary unavailable due to API error.';

export class OpenAiTextGenerator implements TextGenerator {
  constructor(private readonly options: OpenAiChatOptions) {}

  async complete(prompt: string, jsonMode: boolean): Promise<string> {
    if (!this.options.apiKey) {
      log.warn('OPENAI_API_KEY is not set; text generation disabled');
      return '';
    }

    try {
      const data = await fetchJson<ChatCompletionResponse>(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        body: {
          model: this.options.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: jsonMode ? 0 : 0.2,
          ...(jsonMode ? { response_format: { type: 'json_object' } } : {}),
        },
        timeoutMs: this.options.timeoutMs,
        fetchFn: this.options.fetchFn,
      });

      return data.choices?.[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      log.error('Chat completion failed', { model: this.options.model, jsonMode, error: errorMessage(error) });
      return '';
    }
  }
}

// ── Prompts ────────────────────────────────────────────────────────────

export async function summarizeText(llm: TextGenerator, text: string, maxWords = 120): Promise<string> {
  if (!text.trim()) return '';

  const prompt = `Summarize the following content in under ${maxWords} words.
Keep it factual, concise and structured. Do not add facts that are not in the text.

TEXT:
${text}`;

  const summary = await llm.complete(prompt, false);
  return summary || SUMMARY_UNAVAILABLE;
}

/**
 * Credibility in [0, 1]. A non-numeric answer falls back to the heuristic
 * score; no answer at all is the neutral 0.5.
 */
export async function evaluateSource(llm: TextGenerator, url: string, content: string): Promise<number> {
  const prompt = `Return ONLY a number between 0 and 1 representing credibility.

URL: ${url}

Content snippet:
${content.slice(0, 500)}`;

  const output = await llm.complete(prompt, false);
  if (!output) return 0.5;

  const value = Number.parseFloat(output);
  if (Number.isNaN(value)) {
    log.warn('Non-numeric credibility output', { url, output: output.slice(0, 80) });
    return heuristicCredibility(url, content);
  }
  return Math.max(0, Math.min(1, value));
}

export async function rewriteQuery(
  llm: TextGenerator,
  query: string,
  history: readonly ConversationTurn[],
): Promise<string> {
  const historyText = history.map((turn) => `${turn.role}: ${turn.content}`).join('\n');

  const prompt = `Rewrite the user's latest query to be standalone and self-contained.
Only rewrite. Do NOT answer the question.

History:
${historyText}

Query: ${query}

Standalone Query:`;

  const rewritten = (await llm.complete(prompt, false)).replace(/"/g, '').trim();
  return rewritten || query;
}

export async function compareRuns(
  llm: TextGenerator,
  previousSummary: string,
  latestSummary: string,
  topic: string,
): Promise<string> {
  const prompt = `You are comparing two research summaries produced by an automated research agent.

Topic: ${topic}

Your job:
- Identify meaningful NEW information in the latest run
- Point out information that DISAPPEARED compared to the previous run
- Detect shifts in emphasis, tone, or sentiment
- Detect contradictions or corrections
- Finish with a short 2-3 line conclusion

Previous Run Summary:
---------------------
${previousSummary}

Latest Run Summary:
-------------------
${latestSummary}

Produce the comparison with these sections:
### New Insights
### Missing / Removed Insights
### Changes in Tone / Emphasis
### Contradictions / Anomalies
### Final Conclusion`;

  const diff = await llm.complete(prompt, false);
  return diff || SEMANTIC_DIFF_UNAVAILABLE;
}
