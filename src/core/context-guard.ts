/**
 * Context classifiers
 * Topic and appropriateness filters applied before stage-specific validation.
 * Each classifier is a pure function so it can be swapped or tested on its own.
 */

import type { Stage } from './stages.js';

export type ContextRejectionReason = 'off_topic' | 'inappropriate' | 'malformed_email';

export type ContextVerdict =
  | { allowed: true }
  | { allowed: false; reason: ContextRejectionReason; message: string };

export type ContextClassifier = (input: string, stage: Stage) => ContextVerdict;

export const OFF_TOPIC_KEYWORDS = [
  'weather',
  'sports',
  'politics',
  'food',
  'movie',
  'music',
  'game',
  'celebrity',
  'news',
  'joke',
  'story',
] as const;

export const INAPPROPRIATE_KEYWORDS = ['hate', 'violence', 'illegal', 'drugs'] as const;

export const CONTEXT_MESSAGES: Record<ContextRejectionReason, string> = {
  off_topic:
    "I'm here to help with your job application. Let's focus on gathering your professional information.",
  inappropriate: 'Please keep our conversation professional and appropriate.',
  malformed_email: 'Please provide a valid email address with @ symbol.',
};

const ALLOWED: ContextVerdict = { allowed: true };

function reject(reason: ContextRejectionReason): ContextVerdict {
  return { allowed: false, reason, message: CONTEXT_MESSAGES[reason] };
}

/**
 * Build a classifier that rejects any input containing one of the keywords
 */
export function createKeywordClassifier(
  keywords: readonly string[],
  reason: ContextRejectionReason
): ContextClassifier {
  return (input) => {
    const normalized = input.trim().toLowerCase();
    return keywords.some((keyword) => normalized.includes(keyword)) ? reject(reason) : ALLOWED;
  };
}

export const offTopicClassifier = createKeywordClassifier(OFF_TOPIC_KEYWORDS, 'off_topic');

export const inappropriateClassifier = createKeywordClassifier(
  INAPPROPRIATE_KEYWORDS,
  'inappropriate'
);

/**
 * In the email stage, anything longer than 5 characters without an "@" is
 * rejected here, before the email pattern is ever checked
 */
export const emailShapeClassifier: ContextClassifier = (input, stage) => {
  if (stage === 'email' && !input.includes('@') && input.length > 5) {
    return reject('malformed_email');
  }
  return ALLOWED;
};

export const DEFAULT_CLASSIFIERS: readonly ContextClassifier[] = [
  offTopicClassifier,
  inappropriateClassifier,
  emailShapeClassifier,
];

/**
 * Run classifiers in order; the first rejection wins
 */
export function validateConversationContext(
  input: string,
  stage: Stage,
  classifiers: readonly ContextClassifier[] = DEFAULT_CLASSIFIERS
): ContextVerdict {
  for (const classify of classifiers) {
    const verdict = classify(input, stage);
    if (!verdict.allowed) {
      return verdict;
    }
  }
  return ALLOWED;
}
