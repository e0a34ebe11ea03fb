const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

export function splitWords(text: string): string[] {
  return text.match(WORD_PATTERN) || [];
}

// Abbreviations such as "e.g." still end a sentence; this is a heuristic splitter.
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => splitWords(sentence).length > 0);
}
