import { describe, expect, it } from 'vitest';
import { calculateJaundiceRate, roundRate } from '../scoring';

describe('calculateJaundiceRate', () => {
  it('rates an empty article as zero', () => {
    expect(calculateJaundiceRate([], new Set())).toBe(0);
    expect(calculateJaundiceRate([], new Set(['скандал']))).toBe(0);
  });

  it('computes the charged share as a percentage', () => {
    const rate = calculateJaundiceRate(['все', 'аутсайдер', 'побег'], new Set(['аутсайдер', 'банкротство']));
    expect(rate).toBeGreaterThan(33);
    expect(rate).toBeLessThan(34);
    expect(rate).toBe(33.33);
  });

  it('counts repeated charged words every time they occur', () => {
    expect(calculateJaundiceRate(['шок', 'шок', 'новость', 'день'], new Set(['шок']))).toBe(50);
  });

  it('rounds to two decimals, halves away from zero', () => {
    const words = Array.from({ length: 800 }, (_, i) => (i === 0 ? 'кризис' : `слово${i}`));
    expect(calculateJaundiceRate(words, new Set(['кризис']))).toBe(0.13);
    expect(calculateJaundiceRate(['кризис', 'кризис', 'день'], new Set(['кризис']))).toBe(66.67);
    expect(roundRate(12.5)).toBe(12.5);
    expect(roundRate(100 / 3)).toBe(33.33);
  });

  it('never decreases as more words are charged', () => {
    const words = ['один', 'два', 'три', 'четыре', 'пять'];
    const rates = words.map((_, i) => calculateJaundiceRate(words, new Set(words.slice(0, i + 1))));
    expect(rates).toEqual([20, 40, 60, 80, 100]);
  });
});
