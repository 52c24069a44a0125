/**
 * Assistant phrasing for every stage of the intake
 */

import type { ActiveStage, Stage } from './stages.js';
import { truncate } from '../utils/index.js';

export const WELCOME_MESSAGE = `Welcome! 👋
I'm your hiring assistant, and I'll be helping you with the initial screening process.
I'll collect some information about you and ask relevant technical questions based on your expertise.
Let's get started! Could you please tell me your full name?`;

export const FAREWELL_MESSAGE =
  'Thank you for your time! We appreciate you taking the time to speak with us. Our team will review your information and get back to you soon. Have a great day! 👋';

export const CLOSING_MESSAGE =
  "Thank you! Your application has been completed. Is there anything else you'd like to add or any questions about the next steps?";

export const ESCALATION_NOTICE =
  "I notice we're having some difficulty staying on topic. Let's focus on completing your application.";

/**
 * The question asked when a stage becomes current
 */
export const STAGE_PROMPTS: Record<Stage, string> = {
  name: 'Could you please tell me your full name?',
  email: 'Great! Could you please provide your email address?',
  phone: "Thank you! What's the best phone number to reach you?",
  experience: 'How many years of professional experience do you have?',
  position: 'What position(s) are you interested in?',
  location: 'What is your current location?',
  tech_stack:
    "Please list the technologies you're proficient in (programming languages, frameworks, databases, tools, etc.):",
  technical_questions: 'Please provide your answers to the technical questions:',
  conclusion: CLOSING_MESSAGE,
};

export interface CorrectivePrompt {
  /** Shown on the first and second failed attempt */
  standard: string;
  /** Shown once the error count reaches the escalation threshold */
  strict: string;
}

export const CORRECTIVE_PROMPTS: Record<ActiveStage, CorrectivePrompt> = {
  name: {
    standard: 'Please provide your full name (at least 2 characters).',
    strict: "I still need your name to continue. Please type your full name, for example 'Jane Doe'.",
  },
  email: {
    standard: 'Please provide a valid email address (e.g., john.doe@email.com).',
    strict:
      "I'm having trouble with the email format. Please provide a valid email address like: example@company.com",
  },
  phone: {
    standard: 'Please provide a valid phone number (e.g., +1234567890 or 1234567890).',
    strict:
      'Please provide a valid phone number with 10-15 digits. You can include country code if needed (e.g., +1234567890).',
  },
  experience: {
    standard:
      'Please provide your experience in years as a number (e.g., 5, 2.5, or 0 for entry level).',
    strict:
      "Please provide your experience as a number (e.g., '3' for 3 years, '2.5' for 2.5 years, or '0' for entry level).",
  },
  position: {
    standard:
      "Please provide the position you're interested in (e.g., Software Developer, Data Scientist).",
    strict:
      "I need the job title you're applying for before we continue. Please type at least 2 characters, e.g. 'Backend Engineer'.",
  },
  location: {
    standard: 'Please provide your current location (e.g., New York, NY or Remote).',
    strict:
      "I need your location before we continue. Please type a city and region, or simply 'Remote'.",
  },
  tech_stack: {
    standard:
      "Please provide at least one technology you're proficient in (e.g., Python, JavaScript, React).",
    strict:
      "Please list at least one technology you know. For example: 'Python, JavaScript' or 'React, Node.js, MongoDB'.",
  },
  technical_questions: {
    standard: 'Please provide more detailed answers to the technical questions.',
    strict:
      'Your answer is too short to assess. Please write at least a sentence or two for the questions above.',
  },
};

/**
 * Pick the corrective prompt for a failed attempt
 */
export function correctivePrompt(stage: ActiveStage, strict: boolean): string {
  const prompt = CORRECTIVE_PROMPTS[stage];
  return strict ? prompt.strict : prompt.standard;
}

const UNEXPECTED_INPUT_SUBJECTS: Record<ActiveStage, string> = {
  name: 'your name',
  email: 'your email address',
  phone: 'your phone number',
  experience: 'your years of experience',
  position: 'your desired position',
  location: 'your location',
  tech_stack: 'your technical skills',
  technical_questions: 'your answers to the technical questions',
};

/**
 * Reply used when a turn could not be processed at all
 */
export function unexpectedInputMessage(input: string, stage: Stage): string {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return "Please provide a response. I'm waiting for your input.";
  }

  const excerpt = truncate(trimmed, 50);
  if (stage === 'conclusion') {
    return `I'm not sure I understand '${excerpt}'. Could you please rephrase your response?`;
  }
  return `I didn't quite understand '${excerpt}'. Could you please provide ${UNEXPECTED_INPUT_SUBJECTS[stage]}?`;
}
