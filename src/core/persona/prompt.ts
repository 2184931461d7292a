// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA PROMPT — Tone, Methodology and System Prompt from Dimensions
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  CommunicationStyle,
  CopingMechanism,
  PrimaryStressor,
  SocialProfile,
  StressLevel,
} from './types.js';
import type { QuizAnalysis } from './analyzer.js';

export interface PersonaDimensions {
  communicationStyle: CommunicationStyle;
  primaryStressor: PrimaryStressor;
  socialProfile: SocialProfile;
  copingMechanism: CopingMechanism;
  stressLevel: StressLevel;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TONE & METHODOLOGY
// ─────────────────────────────────────────────────────────────────────────────────

const TONES: Record<CommunicationStyle, string> = {
  logical:
    'calm, clear, and structured, like a helpful advisor who breaks down complex problems into manageable steps',
  emotional:
    'warm, empathetic, and compassionate, like a caring friend who truly listens and validates feelings',
  balanced:
    'supportive and adaptable, both practical and empathetic, like a trusted mentor who knows when to listen and when to guide',
};

const METHODOLOGIES: Record<CopingMechanism, string> = {
  analytical:
    'Offer actionable, step-by-step advice based on Cognitive Behavioral Therapy techniques. Help the user identify thought patterns, challenge unhelpful beliefs, and develop concrete action plans.',
  affective:
    'Lead with active listening and emotional validation before offering solutions. Use reflective listening, normalize their experiences, and only suggest gentle next steps after they feel heard.',
  mixed:
    'Balance emotional support with practical guidance. Acknowledge and validate feelings first, then explore actionable solutions together, adapting to what the user needs in the moment.',
};

const APPROACHES: Record<CopingMechanism, string> = {
  analytical: 'Cognitive Behavioral Therapy (CBT)',
  affective: 'Emotion-Focused Therapy',
  mixed: 'Acceptance and Commitment Therapy (ACT)',
};

export function describeTone(style: CommunicationStyle): string {
  return TONES[style];
}

export function describeMethodology(coping: CopingMechanism): string {
  return METHODOLOGIES[coping];
}

export function recommendApproach(coping: CopingMechanism): string {
  return APPROACHES[coping];
}

// ─────────────────────────────────────────────────────────────────────────────────
// STRENGTHS & VULNERABILITIES
// ─────────────────────────────────────────────────────────────────────────────────

export function deriveStrengths(dimensions: PersonaDimensions, analysis: QuizAnalysis): string[] {
  const strengths: string[] = [];

  if (dimensions.copingMechanism === 'analytical') strengths.push('Breaks problems down methodically');
  if (dimensions.copingMechanism === 'affective') strengths.push('In touch with their emotions');
  if (dimensions.copingMechanism === 'mixed') strengths.push('Flexible coping repertoire');

  if (dimensions.socialProfile === 'extroverted') strengths.push('Draws energy from social connection');
  if (dimensions.socialProfile === 'introverted') strengths.push('Comfortable with self-reflection');
  if (dimensions.socialProfile === 'ambiverted') strengths.push('Adapts socially to the situation');

  if (analysis.resilienceScore >= 5) strengths.push('Resilient self-image');
  if (analysis.academicPressure === 1) strengths.push('Paces workload well');

  return strengths.slice(0, 5);
}

export function deriveVulnerabilities(dimensions: PersonaDimensions, analysis: QuizAnalysis): string[] {
  const vulnerabilities: string[] = [];

  if (analysis.academicPressure >= 3) vulnerabilities.push('Overwhelm around deadlines');
  if (analysis.sleepImportance >= 3) vulnerabilities.push('Mood closely tied to sleep quality');
  if (analysis.burnoutSignals > 0) vulnerabilities.push('Risk of burnout');
  if (analysis.stressors.includes('comparison')) vulnerabilities.push('Social comparison');
  if (analysis.resilienceScore <= 3) vulnerabilities.push('Frequent negative self-talk');
  if (dimensions.socialProfile === 'introverted') vulnerabilities.push('May withdraw when struggling');

  if (vulnerabilities.length === 0) vulnerabilities.push('General day-to-day stress');

  return vulnerabilities.slice(0, 5);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROACTIVE TRIGGERS
// ─────────────────────────────────────────────────────────────────────────────────

export function deriveProactiveTriggers(dimensions: PersonaDimensions, analysis: QuizAnalysis): string[] {
  const triggers: string[] = [];

  if (dimensions.primaryStressor === 'academics') {
    triggers.push(
      'If the user mentions exams, deadlines, or assignments, suggest breaking tasks into smaller steps or using a Pomodoro timer.'
    );
  }

  if (dimensions.socialProfile === 'introverted') {
    triggers.push(
      'If the user expresses social anxiety, normalize their feelings and suggest low-stakes, gradual connection.'
    );
  } else if (dimensions.primaryStressor === 'social') {
    triggers.push(
      'If the user feels left out or compares themselves to others online, validate them and suggest reaching out to one trusted person.'
    );
  }

  if (analysis.sleepImportance >= 2) {
    triggers.push(
      'If the user mentions poor sleep or fatigue, prioritize sleep hygiene and check in about their routine.'
    );
  }

  if (analysis.burnoutSignals >= 1) {
    triggers.push(
      'Watch for signs of burnout such as chronic fatigue or loss of motivation, and encourage guilt-free rest.'
    );
  }

  triggers.push('If the user has not checked in after a difficult session, offer a gentle follow-up.');

  return triggers.slice(0, 5);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SYSTEM PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

export function buildSystemPrompt(dimensions: PersonaDimensions, triggers: readonly string[]): string {
  const lines = [
    'You are a personalized mental wellness mentor for college students.',
    `Your tone should be ${describeTone(dimensions.communicationStyle)}.`,
    describeMethodology(dimensions.copingMechanism),
    '',
    'Proactive Support Triggers:',
    ...triggers.map((t) => `- ${t}`),
    '',
    '- Always maintain a non-judgmental, student-friendly tone. Avoid clinical jargon.',
    '- Keep responses concise (2-4 sentences) unless the user asks for more detail.',
    '- End messages with gentle, open-ended questions.',
    '- Celebrate small wins and progress, no matter how minor.',
    '- If the user mentions self-harm or suicide, respond with care and point them to crisis resources.',
  ];

  return lines.join('\n');
}
