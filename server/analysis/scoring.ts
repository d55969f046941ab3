export type ChargedLexicon = ReadonlySet<string>;

export const roundRate = (value: number): number => Math.round(value * 100) / 100;

/** Share of charged words in `words`, as a percentage with two decimals. Empty input rates 0. */
export const calculateJaundiceRate = (words: readonly string[], chargedWords: ChargedLexicon): number => {
  if (!words.length) {
    return 0;
  }
  let charged = 0;
  for (const word of words) {
    if (chargedWords.has(word)) charged++;
  }
  return roundRate((charged * 100) / words.length);
};
