import { TokenCounter } from '../types';

/**
 * Counts whitespace-separated words. Used when no model tokenizer is injected.
 */
export const whitespaceTokenCounter: TokenCounter = (text: string): number => {
  let count = 0;
  let inWord = false;
  for (let i = 0; i < text.length; i++) {
    const isSpace = /\s/.test(text[i]);
    if (!isSpace && !inWord) {
      count++;
    }
    inWord = !isSpace;
  }
  return count;
};
