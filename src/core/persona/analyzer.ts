// ═══════════════════════════════════════════════════════════════════════════════
// QUIZ ANALYZER — Deterministic Scoring of Onboarding Answers
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each answer carries a small set of traits (data/quiz.json). Traits are
// tallied into an analysis, and each personality dimension is derived from
// the tallies by a fixed rule.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { Result } from '../../types/result.js';
import { ok, err } from '../../types/result.js';
import {
  COMMUNICATION_STYLES,
  SOCIAL_PROFILES,
  QUIZ_QUESTION_COUNT,
  type CommunicationStyle,
  type PrimaryStressor,
  type SocialProfile,
  type CopingMechanism,
  type StressLevel,
  type QuizAnswer,
  type QuizResponses,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// QUIZ DEFINITION
// ─────────────────────────────────────────────────────────────────────────────────

const QuizTraitsSchema = z.object({
  communication: z.enum(COMMUNICATION_STYLES).optional(),
  coping: z.enum(['analytical', 'affective', 'distraction']).optional(),
  stressor: z.enum(['academics', 'comparison', 'digital_overload', 'sleep']).optional(),
  socialProfile: z.enum(SOCIAL_PROFILES).optional(),
  resilience: z.number().int().min(1).max(3).optional(),
  academicPressure: z.number().int().min(1).max(3).optional(),
  sleepImpact: z.number().int().min(0).max(3).optional(),
  burnoutRisk: z.boolean().optional(),
});

const QuizAnswerOptionSchema = z.object({
  label: z.string(),
  traits: QuizTraitsSchema,
});

const QuizQuestionSchema = z.object({
  id: z.number().int().positive(),
  text: z.string(),
  answers: z.object({
    a: QuizAnswerOptionSchema,
    b: QuizAnswerOptionSchema,
    c: QuizAnswerOptionSchema,
    d: QuizAnswerOptionSchema,
  }),
});

const QuizDefinitionSchema = z.object({
  version: z.string(),
  questions: z.array(QuizQuestionSchema).length(QUIZ_QUESTION_COUNT),
});

export type QuizTraits = z.infer<typeof QuizTraitsSchema>;
export type QuizQuestion = z.infer<typeof QuizQuestionSchema>;
export type QuizDefinition = z.infer<typeof QuizDefinitionSchema>;

const QUIZ_PATH = new URL('../../../data/quiz.json', import.meta.url);

let quizDefinition: QuizDefinition | null = null;

export function getQuizDefinition(): QuizDefinition {
  if (!quizDefinition) {
    const raw: unknown = JSON.parse(readFileSync(QUIZ_PATH, 'utf8'));
    quizDefinition = QuizDefinitionSchema.parse(raw);
  }
  return quizDefinition;
}

function findQuestion(id: number): QuizQuestion | undefined {
  return getQuizDefinition().questions.find((q) => q.id === id);
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE PARSING
// ─────────────────────────────────────────────────────────────────────────────────

const AnswerSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['a', 'b', 'c', 'd']));

/**
 * Accepts keys as `1`, `"1"` or `"q1"` and answers in either case.
 * Every question 1-10 must be answered.
 */
export function parseQuizResponses(input: Record<string, string>): Result<QuizResponses, string> {
  const responses: QuizResponses = {};

  for (const [key, value] of Object.entries(input)) {
    const id = Number(key.replace(/^q/i, ''));
    if (!Number.isInteger(id) || id < 1 || id > QUIZ_QUESTION_COUNT) {
      return err(`Unknown quiz question: ${key}`);
    }

    const answer = AnswerSchema.safeParse(value);
    if (!answer.success) {
      return err(`Invalid answer for question ${id}: ${value}`);
    }
    responses[id] = answer.data;
  }

  const answered = Object.keys(responses).length;
  if (answered < QUIZ_QUESTION_COUNT) {
    return err(`Invalid quiz data. Expected ${QUIZ_QUESTION_COUNT} questions, got ${answered}`);
  }

  return ok(responses);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ANALYSIS
// ─────────────────────────────────────────────────────────────────────────────────

export interface QuizAnalysis {
  communicationScores: Record<CommunicationStyle, number>;
  stressors: string[];
  socialIndicators: SocialProfile[];
  copingPatterns: string[];
  burnoutSignals: number;
  sleepImportance: number;
  academicPressure: number;
  resilienceScore: number;
}

export function analyzeQuiz(responses: QuizResponses): QuizAnalysis {
  const analysis: QuizAnalysis = {
    communicationScores: { logical: 0, emotional: 0, balanced: 0 },
    stressors: [],
    socialIndicators: [],
    copingPatterns: [],
    burnoutSignals: 0,
    sleepImportance: 0,
    academicPressure: 0,
    resilienceScore: 0,
  };

  const ids = Object.keys(responses).map(Number).sort((a, b) => a - b);

  for (const id of ids) {
    const answer: QuizAnswer | undefined = responses[id];
    const question = findQuestion(id);
    if (!answer || !question) continue;

    const traits = question.answers[answer].traits;

    if (traits.communication) analysis.communicationScores[traits.communication] += 1;
    if (traits.stressor) analysis.stressors.push(traits.stressor);
    if (traits.socialProfile) analysis.socialIndicators.push(traits.socialProfile);
    if (traits.coping) analysis.copingPatterns.push(traits.coping);
    if (traits.burnoutRisk) analysis.burnoutSignals += 1;
    if (traits.sleepImpact !== undefined) {
      analysis.sleepImportance = Math.max(analysis.sleepImportance, traits.sleepImpact);
    }
    if (traits.academicPressure !== undefined) {
      analysis.academicPressure = Math.max(analysis.academicPressure, traits.academicPressure);
    }
    if (traits.resilience !== undefined) analysis.resilienceScore += traits.resilience;
  }

  return analysis;
}

/**
 * Most frequent value; ties go to the value seen first.
 */
function mostFrequent<T>(values: readonly T[]): T | undefined {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: T | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DIMENSIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function determineCommunicationStyle(analysis: QuizAnalysis): CommunicationStyle {
  const entries = Object.entries(analysis.communicationScores);
  const maxScore = Math.max(...entries.map(([, score]) => score));
  if (maxScore === 0) return 'balanced';

  const top = COMMUNICATION_STYLES.filter((style) => analysis.communicationScores[style] === maxScore);
  const [only] = top;
  return top.length === 1 && only ? only : 'balanced';
}

const STRESSOR_MAP: Record<string, PrimaryStressor> = {
  academics: 'academics',
  comparison: 'social',
  digital_overload: 'social',
  sleep: 'sleep',
};

export function determinePrimaryStressor(analysis: QuizAnalysis): PrimaryStressor {
  const top = mostFrequent(analysis.stressors);
  if (top !== undefined) {
    return STRESSOR_MAP[top] ?? 'general';
  }
  return analysis.academicPressure >= 2 ? 'academics' : 'general';
}

export function determineSocialProfile(analysis: QuizAnalysis): SocialProfile {
  return mostFrequent(analysis.socialIndicators) ?? 'ambiverted';
}

export function determineCopingMechanism(analysis: QuizAnalysis): CopingMechanism {
  const analytical = analysis.copingPatterns.filter((p) => p === 'analytical').length;
  const affective = analysis.copingPatterns.filter((p) => p === 'affective').length;

  if (analytical > affective) return 'analytical';
  if (affective > analytical) return 'affective';
  return 'mixed';
}

export function assessStressLevel(analysis: QuizAnalysis): StressLevel {
  let indicators = 0;

  if (analysis.academicPressure >= 3) indicators += 2;
  else if (analysis.academicPressure >= 2) indicators += 1;

  indicators += analysis.burnoutSignals;

  if (analysis.sleepImportance >= 3) indicators += 1;

  // Two resilience questions, each scored 1-3
  if (analysis.resilienceScore <= 3) indicators += 1;

  if (indicators >= 4) return 'high';
  if (indicators >= 2) return 'moderate';
  return 'low';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Renders answers as question/answer pairs, ordered by question number.
 */
export function formatQuizForAnalysis(responses: QuizResponses): string {
  const ids = Object.keys(responses).map(Number).sort((a, b) => a - b);
  let formatted = 'User Quiz Responses:\n\n';

  for (const id of ids) {
    const answer = responses[id];
    if (!answer) continue;
    const question = findQuestion(id);
    const questionText = question?.text ?? `Question ${id}`;
    const answerText = question?.answers[answer].label ?? `Answer ${answer}`;
    formatted += `Q${id}: ${questionText}\nAnswer: ${answerText}\n\n`;
  }

  return formatted;
}
