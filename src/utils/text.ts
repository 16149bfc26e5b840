// Case- and diacritic-insensitive text folding shared by the keyword checks and grouping.

/** 'İstanbul' -> 'istanbul', 'Atölye' -> 'atolye'. */
export function foldText(s: string | null | undefined): string {
  if (!s) return '';
  return s
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\u0131/g, 'i');
}

/** Folded words of `s`, split on anything that is not a letter or digit. */
export function foldedTokens(s: string): string[] {
  return foldText(s).split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}
