/**
 * Tests for the conversation driver
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ConversationDriver,
  evaluateStageInput,
  formatQuestionsResponse,
  type DriverEvent,
} from './driver.js';
import { FallbackQuestionGenerator, type QuestionGenerator, type QuestionSet } from './questions.js';
import { createSession, type SessionState } from './session.js';
import { STAGES, type ActiveStage, type Stage } from './stages.js';
import { CONTEXT_MESSAGES } from './context-guard.js';
import {
  CLOSING_MESSAGE,
  CORRECTIVE_PROMPTS,
  ESCALATION_NOTICE,
  FAREWELL_MESSAGE,
  STAGE_PROMPTS,
} from './messages.js';
import { formatCandidateSummary } from './summary.js';
import { createLogger } from '../utils/logger.js';

const NOW = new Date('2024-05-01T09:30:00.000Z');
const ANSWERS = 'Lists are mutable while tuples are immutable; goroutines are cheap threads.';

const PASSING: Record<ActiveStage, string> = {
  name: 'Jane Doe',
  email: 'jane@x.com',
  phone: '+12345678901',
  experience: '2.5 years',
  position: 'Engineer',
  location: 'Remote',
  tech_stack: 'Python, Go',
  technical_questions: ANSWERS,
};

const FAILING: Record<ActiveStage, string> = {
  name: 'J',
  email: 'a@b',
  phone: '12345',
  experience: 'lots',
  position: 'x',
  location: 'y',
  tech_stack: ', ;',
  technical_questions: 'short',
};

const ACTIVE_STAGES = STAGES.filter((stage): stage is ActiveStage => stage !== 'conclusion');

const STUB_QUESTIONS = [
  'How do Python generators differ from lists?',
  'How do Go channels coordinate goroutines?',
  'How would you profile a slow service?',
];

function stubGenerator(result: QuestionSet = { questions: STUB_QUESTIONS, source: 'provider' }) {
  const generate = vi.fn(async (_techStack: readonly string[]) => result);
  const generator: QuestionGenerator = { name: 'stub', generate };
  return { generator, generate };
}

function createDriver(questionGenerator: QuestionGenerator = stubGenerator().generator) {
  return new ConversationDriver({
    questionGenerator,
    logger: createLogger({ console: false }),
    now: () => NOW,
  });
}

function stateAt(stage: Stage, errorCount = 0): SessionState {
  return { ...createSession(NOW), stage, errorCount };
}

describe('evaluateStageInput', () => {
  it('stores trimmed values', () => {
    expect(evaluateStageInput('name', '  Jane Doe  ')).toEqual({ valid: true, update: { name: 'Jane Doe' } });
    expect(evaluateStageInput('email', ' jane@x.com ')).toEqual({
      valid: true,
      update: { email: 'jane@x.com' },
    });
  });

  it('parses experience into years', () => {
    expect(evaluateStageInput('experience', '2.5 years')).toEqual({
      valid: true,
      update: { experience: 2.5 },
    });
  });

  it('parses the tech stack', () => {
    expect(evaluateStageInput('tech_stack', 'python, GO; react')).toEqual({
      valid: true,
      update: { techStack: ['Python', 'Go', 'React'] },
    });
  });

  it('rejects the failing input of every stage', () => {
    for (const stage of ACTIVE_STAGES) {
      expect(evaluateStageInput(stage, FAILING[stage])).toEqual({ valid: false });
    }
  });
});

describe('formatQuestionsResponse', () => {
  it('lists the skills and numbers the questions', () => {
    expect(formatQuestionsResponse(['Python', 'Go'], ['Q one?', 'Q two?'])).toBe(
      "Excellent! I see you're skilled in: Python, Go\n\nHere are some technical questions based on your expertise:\n\n1. Q one?\n2. Q two?\n\nPlease provide your answers to these questions:"
    );
  });
});

describe('ConversationDriver', () => {
  describe('stage transitions', () => {
    it.each(ACTIVE_STAGES)('a failing input in %s increments errorCount and keeps the stage', async (stage) => {
      const state = stateAt(stage, 1);

      const result = await createDriver().process(FAILING[stage], state);

      expect(result.outcome).toBe('rejected');
      expect(result.state.stage).toBe(stage);
      expect(result.state.errorCount).toBe(2);
      expect(result.state.record).toEqual({});
      expect(result.response).toBe(CORRECTIVE_PROMPTS[stage].standard);
    });

    it.each(ACTIVE_STAGES)('a passing input in %s advances to the next stage', async (stage) => {
      const state = stateAt(stage, 2);

      const result = await createDriver().process(PASSING[stage], state);

      expect(result.outcome).toBe('advanced');
      expect(result.state.stage).toBe(STAGES[STAGES.indexOf(stage) + 1]);
      expect(result.state.errorCount).toBe(0);
      expect(result.state.conversationStarted).toBe(true);
    });

    it('greets the candidate by name', async () => {
      const result = await createDriver().process('Jane Doe', stateAt('name'));
      expect(result.response).toBe(`Nice to meet you, Jane Doe! ${STAGE_PROMPTS.email}`);
    });

    it('asks the next stage question after a plain field', async () => {
      const result = await createDriver().process('+12345678901', stateAt('phone'));
      expect(result.response).toBe(STAGE_PROMPTS.experience);
      expect(result.state.record).toEqual({ phone: '+12345678901' });
    });

    it('stores the tech stack together with the generated questions', async () => {
      const { generator, generate } = stubGenerator();

      const result = await createDriver(generator).process('python, go, python', stateAt('tech_stack'));

      expect(generate).toHaveBeenCalledWith(['Python', 'Go']);
      expect(result.state.record).toEqual({ techStack: ['Python', 'Go'], technicalQuestions: STUB_QUESTIONS });
      expect(result.response).toBe(formatQuestionsResponse(['Python', 'Go'], STUB_QUESTIONS));
    });

    it('returns the summary when the answers are accepted', async () => {
      const state: SessionState = {
        ...stateAt('technical_questions'),
        record: { name: 'Jane Doe', techStack: ['Go'], technicalQuestions: STUB_QUESTIONS },
      };

      const result = await createDriver().process(ANSWERS, state);

      expect(result.state.stage).toBe('conclusion');
      expect(result.state.record.technicalAnswers).toBe(ANSWERS);
      expect(result.response).toBe(formatCandidateSummary(result.state.record));
    });
  });

  describe('escalation', () => {
    it('switches to the strict corrective prompt on the third failure', async () => {
      const driver = createDriver();
      let state = stateAt('email');
      const responses: string[] = [];

      for (let i = 0; i < 3; i++) {
        const result = await driver.process('a@b', state);
        responses.push(result.response);
        state = result.state;
      }

      expect(responses).toEqual([
        CORRECTIVE_PROMPTS.email.standard,
        CORRECTIVE_PROMPTS.email.standard,
        CORRECTIVE_PROMPTS.email.strict,
      ]);
      expect(state.errorCount).toBe(3);
    });

    it('prepends the escalation notice to the third redirect', async () => {
      const driver = createDriver();
      let state = stateAt('name');
      const responses: string[] = [];

      for (let i = 0; i < 3; i++) {
        const result = await driver.process('tell me a joke', state);
        expect(result.outcome).toBe('redirected');
        responses.push(result.response);
        state = result.state;
      }

      expect(responses[0]).toBe(CONTEXT_MESSAGES.off_topic);
      expect(responses[2]).toBe(`${ESCALATION_NOTICE}\n\n${CONTEXT_MESSAGES.off_topic}`);
      expect(state.stage).toBe('name');
      expect(state.errorCount).toBe(3);
    });

    it('counts context and validation failures together', async () => {
      const driver = createDriver();
      const first = await driver.process('what about the weather', stateAt('phone'));
      const second = await driver.process('12345', first.state);
      const third = await driver.process('12', second.state);

      expect(third.state.errorCount).toBe(3);
      expect(third.response).toBe(CORRECTIVE_PROMPTS.phone.strict);
    });

    it('resets the error count after a success', async () => {
      const result = await createDriver().process('jane@x.com', stateAt('email', 5));
      expect(result.state.errorCount).toBe(0);
    });
  });

  describe('context checks', () => {
    it('rejects an email without @ before validating it', async () => {
      const result = await createDriver().process('janedoe.com', stateAt('email'));

      expect(result.outcome).toBe('redirected');
      expect(result.response).toBe(CONTEXT_MESSAGES.malformed_email);
    });

    it('rejects inappropriate input', async () => {
      const result = await createDriver().process('I like violence', stateAt('position'));
      expect(result.response).toBe(CONTEXT_MESSAGES.inappropriate);
    });

    it('uses custom classifiers when given', async () => {
      const driver = new ConversationDriver({
        questionGenerator: stubGenerator().generator,
        classifiers: [],
        logger: createLogger({ console: false }),
      });

      const result = await driver.process('tell me a joke', stateAt('name'));

      expect(result.outcome).toBe('advanced');
      expect(result.state.record.name).toBe('tell me a joke');
    });

    it('applies a custom escalation threshold', async () => {
      const driver = new ConversationDriver({
        questionGenerator: stubGenerator().generator,
        escalationThreshold: 1,
        logger: createLogger({ console: false }),
      });

      const result = await driver.process('J', stateAt('name'));
      expect(result.response).toBe(CORRECTIVE_PROMPTS.name.strict);
    });
  });

  describe('exit commands', () => {
    it.each(STAGES)('leave the state unchanged in %s', async (stage) => {
      const state = stateAt(stage, 1);

      const result = await createDriver().process('  Bye ', state);

      expect(result).toEqual({ response: FAREWELL_MESSAGE, state, outcome: 'exit' });
      expect(result.state).toBe(state);
    });

    it('only match whole words', async () => {
      const result = await createDriver().process('Done Smith', stateAt('name'));
      expect(result.outcome).toBe('advanced');
    });
  });

  describe('conclusion', () => {
    it('acknowledges further messages without changing the state', async () => {
      const state = stateAt('conclusion');

      const result = await createDriver().process('When will I hear back?', state);

      expect(result).toEqual({ response: CLOSING_MESSAGE, state, outcome: 'concluded' });
    });

    it('still applies context checks', async () => {
      const result = await createDriver().process('any sports news?', stateAt('conclusion'));
      expect(result.outcome).toBe('redirected');
      expect(result.state.errorCount).toBe(1);
    });
  });

  describe('failures', () => {
    it('returns a contextual prompt when the question generator throws', async () => {
      const generator: QuestionGenerator = {
        name: 'broken',
        generate: async () => {
          throw new Error('generator exploded');
        },
      };
      const state = stateAt('tech_stack');

      const result = await createDriver(generator).process('Python, Go', state);

      expect(result).toEqual({
        response: "I didn't quite understand 'Python, Go'. Could you please provide your technical skills?",
        state,
        outcome: 'unexpected',
      });
    });

    it('advances a tech stack named after object built-ins', async () => {
      const driver = createDriver(new FallbackQuestionGenerator());

      const result = await driver.process('Constructor, __proto__', stateAt('tech_stack'));

      expect(result.outcome).toBe('advanced');
      expect(result.state.stage).toBe('technical_questions');
      expect(result.state.record.techStack).toEqual(['Constructor', '__Proto__']);
      expect(result.state.record.technicalQuestions).toHaveLength(4);
    });

    it('ignores failing event handlers', async () => {
      const driver = createDriver();
      driver.onEvent(() => {
        throw new Error('handler failed');
      });

      const result = await driver.process('Jane Doe', stateAt('name'));
      expect(result.outcome).toBe('advanced');
    });
  });

  describe('events', () => {
    it('emits events for a tech stack turn', async () => {
      const driver = createDriver();
      const events: DriverEvent[] = [];
      driver.onEvent((event) => events.push(event));

      await driver.process('Python, Go', stateAt('tech_stack'));

      expect(events).toEqual([
        { type: 'questions_requested', techStack: ['Python', 'Go'] },
        { type: 'questions_generated', questions: STUB_QUESTIONS, source: 'provider' },
        { type: 'stage_change', from: 'tech_stack', to: 'technical_questions' },
      ]);
    });

    it('stops delivering events after unsubscribing', async () => {
      const driver = createDriver();
      const events: DriverEvent[] = [];
      const unsubscribe = driver.onEvent((event) => events.push(event));

      await driver.process('J', stateAt('name'));
      unsubscribe();
      await driver.process('quit', stateAt('name'));

      expect(events).toEqual([{ type: 'validation_failed', stage: 'name', errorCount: 1 }]);
    });
  });

  describe('purity', () => {
    it('never modifies the input state and replays identically', async () => {
      const driver = createDriver();
      const state: SessionState = { ...stateAt('tech_stack', 2), record: { name: 'Jane Doe' } };
      const snapshot = structuredClone(state);

      const first = await driver.process('Python, Go', state);
      const second = await driver.process('Python, Go', state);

      expect(state).toEqual(snapshot);
      expect(second).toEqual(first);
    });
  });

  describe('reset', () => {
    it('returns a fresh session', () => {
      expect(createDriver().reset()).toEqual({
        version: 1,
        stage: 'name',
        record: {},
        errorCount: 0,
        conversationStarted: false,
        startedAt: NOW.toISOString(),
        updatedAt: NOW.toISOString(),
      });
    });
  });

  describe('end to end', () => {
    it('collects a full application with fallback questions', async () => {
      const driver = new ConversationDriver({
        questionGenerator: new FallbackQuestionGenerator(),
        logger: createLogger({ console: false }),
        now: () => NOW,
      });

      let state = driver.reset();
      for (const input of ['Jane Doe', 'jane@x.com', '+12345678901', '3', 'Engineer', 'Remote', 'Python, Go']) {
        const result = await driver.process(input, state);
        expect(result.outcome).toBe('advanced');
        state = result.state;
      }

      expect(state.stage).toBe('technical_questions');
      expect(state.record).toEqual({
        name: 'Jane Doe',
        email: 'jane@x.com',
        phone: '+12345678901',
        experience: 3,
        position: 'Engineer',
        location: 'Remote',
        techStack: ['Python', 'Go'],
        technicalQuestions: [
          'What are the key differences between lists and tuples in Python?',
          'How do you handle exceptions in Python, and why is it important?',
          'Can you explain your experience with Python?',
        ],
      });

      const final = await driver.process(ANSWERS, state);
      expect(final.state.stage).toBe('conclusion');
      expect(final.response.startsWith('📋 Candidate Summary:\n')).toBe(true);
    });
  });
});
