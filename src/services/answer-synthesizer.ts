// src/services/answer-synthesizer.ts
// Conversational recommendation over the final result set, grounded only in those results.

import type { ConversationSession } from '@/memory/sessionMemory';
import type { ModelBackend } from '@/models/base/backend';
import type { ConversationTurn, ResultGroup } from '@/types/core';
import { fail, ok, type Result } from '@/types/result';
import { ModelBackendError, throwIfAborted, toRetrievalError } from '@/utils/errors';

export const NO_MATCH_MESSAGE = "I couldn't find any events matching your request.";
export const FALLBACK_ANSWER = 'Here are the events I found.';

export interface AnswerSynthesizerOptions {
  contextSize: number;
  historyTurns: number;
}

const DEFAULT_OPTIONS: AnswerSynthesizerOptions = { contextSize: 5, historyTurns: 6 };

/** '2025-12-10' for one date; '2025-12-10 – 2025-12-14 (3 shows)' for several. */
export function formatDateLabel(group: ResultGroup): string {
  const { dates } = group.details;
  if (dates.length > 1) {
    return `${dates[0]} – ${dates[dates.length - 1]} (${dates.length} shows)`;
  }
  return dates[0] ?? group.details.date ?? 'date TBA';
}

function formatPrice(price: number | null): string {
  return price === null ? 'price TBA' : `${price} TL`;
}

export function formatContextLine(group: ResultGroup): string {
  const { title, venue, price } = group.details;
  const summary = group.summary.sentimentSummary || group.reason || '';
  return `- ${title} @ ${venue} (${formatDateLabel(group)}, ${formatPrice(price)}): ${summary}`.trimEnd();
}

function formatHistory(turns: ConversationTurn[]): string {
  if (!turns.length) return '';
  const lines = turns.map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.text}`);
  return `Conversation history:\n${lines.join('\n')}\n\n`;
}

function buildPrompt(query: string, results: ResultGroup[], history: ConversationTurn[], contextSize: number): string {
  const context = results.slice(0, contextSize).map(formatContextLine).join('\n');
  return `You are a helpful event assistant.

${formatHistory(history)}User query: "${query}"

Found events:
${context}

Task: answer the user's query using these events.
- Be conversational and helpful.
- Recommend specific events from the list, and only from the list.
- If the user asks for a plan (e.g. "date night"), propose one.
- Mention prices and dates where relevant.
- Do NOT make up events that are not in the list.
- If the user refers to earlier events (e.g. "the first one"), use the conversation history.`;
}

export class AnswerSynthesizer {
  private readonly options: AnswerSynthesizerOptions;

  constructor(
    private readonly backend: ModelBackend,
    options: Partial<AnswerSynthesizerOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Empty results short-circuit to NO_MATCH_MESSAGE with no model call. History
   * gains the (user, assistant) pair only when the model answers.
   */
  async synthesize(
    query: string,
    results: ResultGroup[],
    session: ConversationSession,
    signal?: AbortSignal,
  ): Promise<Result<string>> {
    if (!results.length) return ok(NO_MATCH_MESSAGE);

    const prompt = buildPrompt(query, results, session.recent(this.options.historyTurns), this.options.contextSize);
    try {
      const text = (await this.backend.generate(prompt, { signal })).trim();
      if (!text) {
        throw new ModelBackendError('malformed_response', 'Empty answer', this.backend.name);
      }
      // An abort after the model answered still discards the exchange.
      throwIfAborted(signal);
      session.appendExchange(query, text);
      return ok(text);
    } catch (err) {
      return fail(toRetrievalError('answer', err));
    }
  }
}
