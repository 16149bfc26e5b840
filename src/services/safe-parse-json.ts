/**
 * Shared JSON parse: strips markdown fences, recovers JSON embedded in prose
 * and normalizes quotes.
 * Used by the model backends for structured generation.
 */
import { logger } from '@/utils/logger';

export function stripCodeFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/** The body of the first fenced block anywhere in the text, e.g. after a lead-in sentence. */
export function extractFencedBlock(text: string): string | null {
  const match = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/.exec(text);
  return match ? match[1].trim() : null;
}

/** The outermost {...} or [...] span, whichever opens first. */
export function extractJsonSpan(text: string): string | null {
  const start = text.search(/[[{]/);
  if (start === -1) return null;
  const close = text[start] === '{' ? '}' : ']';
  const end = text.lastIndexOf(close);
  return end > start ? text.slice(start, end + 1) : null;
}

/** Returns the parsed object or array, or null when the text is not JSON. */
export function safeParseJson(raw: string, context: string): unknown {
  const txt = stripCodeFences(raw);

  const parsed = tryParse(txt);
  if (isObjectLike(parsed)) return parsed;
  if (parsed !== undefined) {
    logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
    return null;
  }

  const candidates: string[] = [];
  const fenced = extractFencedBlock(txt);
  if (fenced) candidates.push(fenced);
  const span = extractJsonSpan(fenced ?? txt);
  if (span) candidates.push(span);

  for (const candidate of candidates) {
    const recovered = tryParse(candidate);
    if (isObjectLike(recovered)) return recovered;
  }

  // Models sometimes answer {'key':'value'}
  for (const candidate of [txt, ...candidates]) {
    const normalized = tryParse(candidate.replace(/'/g, '"'));
    if (isObjectLike(normalized)) return normalized;
  }

  logger.warn('safeParseJson:parse_error', {
    context,
    error: 'Invalid JSON after stripping fences',
    raw: txt.slice(0, 300),
  });
  return null;
}
