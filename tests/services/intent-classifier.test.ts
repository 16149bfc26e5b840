import { describe, expect, it } from 'vitest';
import { IntentClassifier, mentionsSpecificSubject } from '@/services/intent-classifier';
import { ScriptedBackend, jsonReply } from '../helpers/fakes';

describe('mentionsSpecificSubject', () => {
  it.each([
    ['Cheap Jazz concerts under 500 TL in Istanbul', true],
    ['romantic plans in İstanbul', true],
    ['bu hafta sonu atölye', true],
    ['something for 300tl', true],
    ['I want something romantic', false],
    ['a little something for the weekend', false],
  ])('%s -> %s', (query, expected) => {
    expect(mentionsSpecificSubject(query)).toBe(expected);
  });
});

describe('IntentClassifier', () => {
  it('returns the curated tag the model picks for a generic query', async () => {
    const backend = new ScriptedBackend('fast', { json: jsonReply({ intent: 'date-night', confidence: 0.9 }) });
    const result = await new IntentClassifier(backend).classify('I want something romantic');
    expect(result).toEqual({ ok: true, value: 'date-night' });
  });

  it('forces search when the query names a specific subject', async () => {
    const backend = new ScriptedBackend('fast', { json: jsonReply({ intent: 'best-value' }) });
    const result = await new IntentClassifier(backend).classify('Cheap Jazz concerts under 500 TL in Istanbul');
    expect(result).toEqual({ ok: true, value: 'search' });
  });

  it('passes search through', async () => {
    const backend = new ScriptedBackend('fast', { json: jsonReply({ intent: 'search' }) });
    const result = await new IntentClassifier(backend).classify('stand-up comedy');
    expect(result).toEqual({ ok: true, value: 'search' });
  });

  it('fails with malformed_response on an unknown tag', async () => {
    const backend = new ScriptedBackend('fast', { json: jsonReply({ intent: 'romance' }) });
    const result = await new IntentClassifier(backend).classify('something romantic');
    expect(result).toMatchObject({ ok: false, error: { kind: 'malformed_response', stage: 'intent' } });
  });

  it('fails with backend_unavailable when the backend is down', async () => {
    const backend = new ScriptedBackend('fast');
    const result = await new IntentClassifier(backend).classify('something romantic');
    expect(result).toMatchObject({ ok: false, error: { kind: 'backend_unavailable', stage: 'intent' } });
  });

  it('hits the backend on every call', async () => {
    const backend = new ScriptedBackend('fast', { json: jsonReply({ intent: 'search' }) });
    const classifier = new IntentClassifier(backend);
    await classifier.classify('jazz');
    await classifier.classify('jazz');
    expect(backend.prompts).toHaveLength(2);
    expect(backend.prompts[0]).toContain('Query: "jazz"');
  });
});
