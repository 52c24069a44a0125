/**
 * Tests for context classifiers
 */

import { describe, it, expect } from 'vitest';
import {
  CONTEXT_MESSAGES,
  createKeywordClassifier,
  emailShapeClassifier,
  validateConversationContext,
  type ContextClassifier,
} from './context-guard.js';

describe('validateConversationContext', () => {
  it('should allow ordinary answers', () => {
    expect(validateConversationContext('Jane Doe', 'name')).toEqual({ allowed: true });
    expect(validateConversationContext('Python, React', 'tech_stack')).toEqual({ allowed: true });
  });

  it('should reject off-topic input in any stage', () => {
    expect(validateConversationContext('What is the Weather like?', 'phone')).toEqual({
      allowed: false,
      reason: 'off_topic',
      message: CONTEXT_MESSAGES.off_topic,
    });
  });

  it('should reject inappropriate input', () => {
    expect(validateConversationContext('I hate this', 'position')).toEqual({
      allowed: false,
      reason: 'inappropriate',
      message: CONTEXT_MESSAGES.inappropriate,
    });
  });

  it('should let the first rejection win', () => {
    const verdict = validateConversationContext('music and drugs', 'name');
    expect(verdict.allowed === false && verdict.reason).toBe('off_topic');
  });

  it('should match keywords inside longer words', () => {
    const verdict = validateConversationContext('Game developer', 'position');
    expect(verdict.allowed === false && verdict.reason).toBe('off_topic');
  });

  it('should run custom classifiers', () => {
    const noSalary: ContextClassifier = createKeywordClassifier(['salary'], 'off_topic');
    expect(validateConversationContext('What is the salary?', 'name', [noSalary]).allowed).toBe(false);
    expect(validateConversationContext('I love music', 'name', [noSalary]).allowed).toBe(true);
  });
});

describe('emailShapeClassifier', () => {
  it('should reject long input without an @ in the email stage', () => {
    expect(emailShapeClassifier('janexcom', 'email')).toEqual({
      allowed: false,
      reason: 'malformed_email',
      message: 'Please provide a valid email address with @ symbol.',
    });
  });

  it('should leave short input and other stages alone', () => {
    expect(emailShapeClassifier('jane', 'email')).toEqual({ allowed: true });
    expect(emailShapeClassifier('janexcom', 'name')).toEqual({ allowed: true });
    expect(emailShapeClassifier('jane@x', 'email')).toEqual({ allowed: true });
  });
});
