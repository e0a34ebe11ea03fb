import type { Finding } from "../../../shared/analysis-types";
import type { AnalyzerResult, PageSnapshot, Thresholds } from "../types";
import { InsufficientTextError } from "../errors";
import { createFinding, ordinalMetric, ratioMetric } from "../catalog";

const COMPLEX_WORD_SYLLABLES = 3;

export interface TextStatistics {
  sentences: number;
  words: number;
  syllables: number;
  complexWords: number;
}

/**
 * Vowel-group syllable estimate: one syllable per run of vowels, minus a
 * silent trailing "e" (but not a consonant + "le" ending), never below one.
 */
export function countSyllables(word: string): number {
  const letters = word.toLowerCase().replace(/[^a-z]/g, "");
  if (!letters) return 1;

  let count = (letters.match(/[aeiouy]+/g) || []).length;

  if (letters.endsWith("e") && !/[^aeiouy]le$/.test(letters) && count > 1) {
    count--;
  }

  return Math.max(1, count);
}

export function fleschReadingEase(words: number, sentences: number, syllables: number): number {
  return 206.835 - 1.015 * (words / sentences) - 84.6 * (syllables / words);
}

export function readingLevel(score: number): string {
  if (score >= 90) return "very easy";
  if (score >= 80) return "easy";
  if (score >= 70) return "fairly easy";
  if (score >= 60) return "standard";
  if (score >= 50) return "fairly difficult";
  if (score >= 30) return "difficult";
  return "very difficult";
}

export function computeTextStatistics(sentences: readonly string[], words: readonly string[]): TextStatistics {
  if (sentences.length === 0 || words.length === 0) {
    throw new InsufficientTextError(
      `Text readability needs at least one sentence and one word (got ${sentences.length} sentences, ${words.length} words)`
    );
  }

  let syllables = 0;
  let complexWords = 0;
  for (const word of words) {
    const count = countSyllables(word);
    syllables += count;
    if (count >= COMPLEX_WORD_SYLLABLES) complexWords++;
  }

  return { sentences: sentences.length, words: words.length, syllables, complexWords };
}

export function analyzeTextReadability(snapshot: PageSnapshot, thresholds: Thresholds): AnalyzerResult {
  const stats = computeTextStatistics(snapshot.sentences, snapshot.words);
  const findings: Finding[] = [];

  const flesch = fleschReadingEase(stats.words, stats.sentences, stats.syllables);
  const averageSentenceLength = stats.words / stats.sentences;
  const lexicalComplexity = stats.complexWords / stats.words;

  if (flesch < thresholds.minFleschScore) {
    findings.push(
      createFinding(
        "med",
        "text_readability",
        `Text is ${readingLevel(flesch)} to read (Flesch Reading Ease ${flesch.toFixed(1)}).`,
        "flesch_reading_ease"
      )
    );
  }

  if (averageSentenceLength > thresholds.maxAverageSentenceLength) {
    findings.push(
      createFinding(
        "low",
        "text_readability",
        `Sentences average ${averageSentenceLength.toFixed(1)} words (maximum ${thresholds.maxAverageSentenceLength}).`,
        "average_sentence_length"
      )
    );
  }

  if (lexicalComplexity > thresholds.maxComplexWordRatio) {
    findings.push(
      createFinding(
        "low",
        "text_readability",
        `${(lexicalComplexity * 100).toFixed(1)}% of words have three or more syllables.`,
        "lexical_complexity"
      )
    );
  }

  return {
    metrics: [
      ordinalMetric("flesch_reading_ease", flesch),
      ordinalMetric("average_sentence_length", averageSentenceLength),
      ratioMetric("lexical_complexity", lexicalComplexity),
    ],
    findings,
  };
}
