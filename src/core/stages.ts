/**
 * Stage catalog for the intake conversation
 * Defines the fixed order of stages and their display metadata
 */

/**
 * Ordered intake stages. The conversation only ever moves forward through this list.
 */
export const STAGES = [
  'name',
  'email',
  'phone',
  'experience',
  'position',
  'location',
  'tech_stack',
  'technical_questions',
  'conclusion',
] as const;

export type Stage = (typeof STAGES)[number];

/**
 * Stages that still accept an answer (everything but the terminal stage)
 */
export type ActiveStage = Exclude<Stage, 'conclusion'>;

/**
 * Number of answerable steps shown in progress output
 */
export const TOTAL_STEPS = STAGES.length - 1;

/**
 * Check if a string is a valid stage name
 */
export function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

/**
 * Position of a stage in the sequence (0-based)
 */
export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

/**
 * The unique successor of a stage. The terminal stage is its own successor.
 */
export function nextStage(stage: Stage): Stage {
  const index = stageIndex(stage);
  return STAGES[Math.min(index + 1, STAGES.length - 1)];
}

/**
 * Human-readable stage labels for progress display
 */
export const STAGE_LABELS: Record<Stage, string> = {
  name: 'Personal Information',
  email: 'Contact Details',
  phone: 'Phone Number',
  experience: 'Experience Level',
  position: 'Desired Position',
  location: 'Location',
  tech_stack: 'Technical Skills',
  technical_questions: 'Technical Assessment',
  conclusion: 'Complete',
};

/**
 * Input tips shown under the prompt for each answerable stage
 */
export const STAGE_HINTS: Record<ActiveStage, string> = {
  name: 'Just type your full name to get started!',
  email: 'Use your professional email address',
  phone: 'Include country code if international (e.g., +1234567890)',
  experience: "You can say '3 years' or just '3'",
  position: "Be specific about the role you want (e.g., 'Senior Python Developer')",
  location: "You can say 'Remote' or specify a city",
  tech_stack: "List technologies separated by commas (e.g., 'Python, React, AWS')",
  technical_questions: 'Answer all questions in one message; a few sentences each is plenty',
};

/**
 * Progress through the intake, as a 1-based step and a completion ratio
 */
export function stageProgress(stage: Stage): { step: number; total: number; ratio: number } {
  const index = stageIndex(stage);
  return {
    step: Math.min(index + 1, TOTAL_STEPS),
    total: TOTAL_STEPS,
    ratio: Math.min(index / TOTAL_STEPS, 1),
  };
}
