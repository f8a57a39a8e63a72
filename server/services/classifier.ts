/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

/**
 * Turn Classifier
 * Labels each turn with topic, sentiment and question type.
 *
 * The default strategy is keyword/lexicon based and fully deterministic:
 * same text + same vocabulary version => same labels.
 */

import { z } from 'zod';
import {
  QUESTION_TYPES,
  SENTIMENTS,
  type QuestionType,
  type Sentiment,
  type TurnRole,
} from '@shared/schema';
import { ClassificationDegraded, describeError } from '../errors';
import topicVocabularyFile from '../config/topic-vocabulary.json';
import sentimentLexiconFile from '../config/sentiment-lexicon.json';

export interface Labels {
  topic: string;
  sentiment: Sentiment;
  questionType: QuestionType | null;
}

/** Swappable strategy; a small model can stand in for the keyword rules. */
export interface TurnClassifier {
  readonly version: string;
  classify(text: string, role: TurnRole): Labels | Promise<Labels>;
}

export const GENERAL_TOPIC = 'general';

export function degradedLabels(role: TurnRole): Labels {
  return {
    topic: 'unknown',
    sentiment: 'neutral',
    questionType: role === 'student' ? 'other' : null,
  };
}

const topicVocabularySchema = z.object({
  version: z.string(),
  topics: z.record(z.array(z.string().min(1))),
});

const sentimentLexiconSchema = z.object({
  positive: z.array(z.string()),
  negative: z.array(z.string()),
  negators: z.array(z.string()),
});

export type TopicVocabulary = Record<string, string[]>;
export type SentimentLexicon = z.infer<typeof sentimentLexiconSchema>;

const defaultVocabulary = topicVocabularySchema.parse(topicVocabularyFile);
const defaultLexicon = sentimentLexiconSchema.parse(sentimentLexiconFile);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .match(/[a-z0-9']+/g) ?? [];
}

interface CompiledTopic {
  topic: string;
  words: Set<string>;
  phrases: string[];
}

function compileVocabulary(vocabulary: TopicVocabulary): CompiledTopic[] {
  return Object.entries(vocabulary).map(([topic, keywords]) => {
    const normalized = keywords.map((keyword) => tokenize(keyword).join(' ')).filter(Boolean);
    return {
      topic,
      words: new Set(normalized.filter((k) => !k.includes(' '))),
      phrases: normalized.filter((k) => k.includes(' ')),
    };
  });
}

/**
 * Score = number of distinct keywords present. The best topic wins when its
 * share of all keyword hits reaches the threshold; ties keep vocabulary order.
 */
export function classifyTopic(tokens: string[], topics: CompiledTopic[], threshold: number): string {
  if (tokens.length === 0) return GENERAL_TOPIC;

  const tokenSet = new Set(tokens);
  const joined = ` ${tokens.join(' ')} `;
  let best: { topic: string; score: number } | null = null;
  let total = 0;

  for (const entry of topics) {
    let score = 0;
    for (const word of entry.words) {
      if (tokenSet.has(word)) score++;
    }
    for (const phrase of entry.phrases) {
      if (joined.includes(` ${phrase} `)) score++;
    }
    total += score;
    if (score > 0 && (best === null || score > best.score)) {
      best = { topic: entry.topic, score };
    }
  }

  if (best === null || total === 0) return GENERAL_TOPIC;
  return best.score / total >= threshold ? best.topic : GENERAL_TOPIC;
}

export function classifySentiment(tokens: string[], lexicon: SentimentLexicon): Sentiment {
  const positive = new Set(lexicon.positive);
  const negative = new Set(lexicon.negative);
  const negators = new Set(lexicon.negators);

  let score = 0;
  tokens.forEach((token, i) => {
    const polarity = positive.has(token) ? 1 : negative.has(token) ? -1 : 0;
    if (polarity === 0) return;
    const negated = negators.has(tokens[i - 1] ?? '') || negators.has(tokens[i - 2] ?? '');
    score += negated ? -polarity : polarity;
  });

  if (score > 0) return 'positive';
  if (score < 0) return 'negative';
  return 'neutral';
}

const OPEN_ENDED_START = /^(why|how(?!\s+(many|much|old|long|far|often)\b)|how come)\b/;
const OPEN_ENDED_CUES = /\b(explain|describe|compare|discuss|what if|what do you think|what would happen|in your opinion|help me understand)\b/;
const FACTUAL_START = /^(what|when|where|who|whom|which|whose|how\s+(many|much|old|long|far|often)|is|are|was|were|do|does|did|can|could|will|define|name|list)\b/;
const FACTUAL_CUES = /\b(what is|what's|what are|definition of|formula for|how many|how much)\b/;

export function classifyQuestionType(text: string, role: TurnRole): QuestionType | null {
  if (role !== 'student') return null;

  const normalized = tokenize(text).join(' ');
  if (!normalized) return 'other';

  if (OPEN_ENDED_START.test(normalized) || OPEN_ENDED_CUES.test(normalized)) return 'open-ended';
  if (FACTUAL_START.test(normalized) || FACTUAL_CUES.test(normalized)) return 'factual';
  return 'other';
}

export interface KeywordClassifierOptions {
  vocabulary?: TopicVocabulary;
  extraKeywords?: TopicVocabulary;
  lexicon?: SentimentLexicon;
  confidenceThreshold?: number;
}

export class KeywordTurnClassifier implements TurnClassifier {
  readonly version: string;
  private readonly topics: CompiledTopic[];
  private readonly lexicon: SentimentLexicon;
  private readonly threshold: number;

  constructor(options: KeywordClassifierOptions = {}) {
    const vocabulary: TopicVocabulary = { ...(options.vocabulary ?? defaultVocabulary.topics) };
    for (const [topic, keywords] of Object.entries(options.extraKeywords ?? {})) {
      vocabulary[topic] = [...(vocabulary[topic] ?? []), ...keywords];
    }
    this.topics = compileVocabulary(vocabulary);
    this.lexicon = options.lexicon ?? defaultLexicon;
    this.threshold = options.confidenceThreshold ?? 0.5;
    this.version = `keyword-${options.vocabulary ? 'custom' : defaultVocabulary.version}`;
  }

  classify(text: string, role: TurnRole): Labels {
    const tokens = tokenize(text);
    return {
      topic: classifyTopic(tokens, this.topics, this.threshold),
      sentiment: classifySentiment(tokens, this.lexicon),
      questionType: classifyQuestionType(text, role),
    };
  }
}

const labelsSchema = z.object({
  topic: z.string().trim().min(1),
  sentiment: z.enum(SENTIMENTS),
  questionType: z.enum(QUESTION_TYPES).nullable(),
});

export interface ClassificationOutcome {
  labels: Labels;
  degraded: boolean;
}

/**
 * Runs a strategy under a time budget. Never rejects: a throw, a timeout or a
 * malformed label set falls back to the degraded defaults.
 */
export async function classifyTurn(
  classifier: TurnClassifier,
  text: string,
  role: TurnRole,
  timeoutMs: number
): Promise<ClassificationOutcome> {
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ClassificationDegraded(`classification exceeded ${timeoutMs}ms`)),
        timeoutMs
      );
    });
    const raw = await Promise.race([
      Promise.resolve().then(() => classifier.classify(text, role)),
      timeout,
    ]);

    const parsed = labelsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ClassificationDegraded(`classifier ${classifier.version} returned invalid labels`);
    }
    const labels = parsed.data;
    if (role === 'student' && labels.questionType === null) {
      return { labels: { ...labels, questionType: 'other' }, degraded: false };
    }
    if (role === 'tutor' && labels.questionType !== null) {
      return { labels: { ...labels, questionType: null }, degraded: false };
    }
    return { labels, degraded: false };
  } catch (error) {
    const degraded = error instanceof ClassificationDegraded
      ? error
      : new ClassificationDegraded(describeError(error), error);
    console.warn(`[Classifier] ⚠️ ClassificationDegraded (${classifier.version}): ${degraded.message}`);
    return { labels: degradedLabels(role), degraded: true };
  } finally {
    clearTimeout(timer);
  }
}
