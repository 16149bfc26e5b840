import { describe, expect, it } from 'vitest';
import { foldText, foldedTokens } from '@/utils/text';

describe('foldText', () => {
  it('drops case and diacritics, including the dotted and dotless i', () => {
    expect(foldText('İstanbul')).toBe('istanbul');
    expect(foldText('ISTANBUL')).toBe('istanbul');
    expect(foldText('Atölye Çalışması')).toBe('atolye calismasi');
  });

  it('maps nullish input to an empty string', () => {
    expect(foldText(null)).toBe('');
    expect(foldText(undefined)).toBe('');
  });
});

describe('foldedTokens', () => {
  it('splits on punctuation and whitespace', () => {
    expect(foldedTokens('Jazz, under 500TL — Kadıköy!')).toEqual(['jazz', 'under', '500tl', 'kadikoy']);
  });
});
