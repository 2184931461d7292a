// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA TYPES — Personality Profile, Live State, Actions
// ═══════════════════════════════════════════════════════════════════════════════
//
// A persona pairs two records:
// - PersonalityProfile: derived once from the onboarding quiz, never mutated
// - LiveUserState: patched after every chat turn or wellness-tool session
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// PERSONALITY DIMENSIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const COMMUNICATION_STYLES = ['logical', 'emotional', 'balanced'] as const;
export type CommunicationStyle = typeof COMMUNICATION_STYLES[number];

export const PRIMARY_STRESSORS = ['academics', 'social', 'sleep', 'general'] as const;
export type PrimaryStressor = typeof PRIMARY_STRESSORS[number];

export const SOCIAL_PROFILES = ['introverted', 'extroverted', 'ambiverted'] as const;
export type SocialProfile = typeof SOCIAL_PROFILES[number];

export const COPING_MECHANISMS = ['analytical', 'affective', 'mixed'] as const;
export type CopingMechanism = typeof COPING_MECHANISMS[number];

export const STRESS_LEVELS = ['low', 'moderate', 'high'] as const;
export type StressLevel = typeof STRESS_LEVELS[number];

// ─────────────────────────────────────────────────────────────────────────────────
// MOOD
// ─────────────────────────────────────────────────────────────────────────────────

export const MOODS = ['neutral', 'happy', 'anxious', 'stressed', 'sad', 'motivated', 'tired'] as const;
export type Mood = typeof MOODS[number];

export const NEGATIVE_MOODS: ReadonlySet<Mood> = new Set<Mood>(['anxious', 'stressed', 'sad', 'tired']);

export function isMood(value: string): value is Mood {
  return MOODS.some((mood) => mood === value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PERSONALITY PROFILE
// ─────────────────────────────────────────────────────────────────────────────────

export interface PersonalityProfile {
  communicationStyle: CommunicationStyle;
  primaryStressor: PrimaryStressor;
  socialProfile: SocialProfile;
  copingMechanism: CopingMechanism;
  stressLevel: StressLevel;

  strengths: string[];
  vulnerabilities: string[];
  recommendedApproach: string;

  // How the assistant should behave with this user
  chatbotTone: string;
  chatbotMethodology: string;
  proactiveTriggers: string[];
  systemPrompt: string;

  generatedAt: string;
  quizVersion: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LIVE STATE
// ─────────────────────────────────────────────────────────────────────────────────

export type InteractionKind =
  | 'onboarding'
  | 'chat'
  | 'tool_use'
  | 'sleep_log'
  | 'breathing_exercise'
  | 'grounding_technique'
  | 'mindfulness_meditation'
  | 'body_relaxation';

export const RECENT_LIST_CAP = 5;

export interface LiveUserState {
  currentMood: Mood;
  lastInteraction: InteractionKind;
  lastInteractionAt: string;

  // Counters never decrease
  chatMessageCount: number;
  toolUsageCount: number;
  sleepLogCount: number;

  // Capped at RECENT_LIST_CAP, oldest evicted first
  recentStressors: string[];
  copingSuccesses: string[];

  needsCheckIn: boolean;
  consecutiveNegativeMoods: number;

  updatedAt: string;
}

export interface UserPersona {
  userId: string;
  profile: PersonalityProfile;
  liveState: LiveUserState;
}

export function createDefaultLiveState(now: Date = new Date()): LiveUserState {
  const timestamp = now.toISOString();
  return {
    currentMood: 'neutral',
    lastInteraction: 'onboarding',
    lastInteractionAt: timestamp,
    chatMessageCount: 0,
    toolUsageCount: 0,
    sleepLogCount: 0,
    recentStressors: [],
    copingSuccesses: [],
    needsCheckIn: false,
    consecutiveNegativeMoods: 0,
    updatedAt: timestamp,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// QUIZ
// ─────────────────────────────────────────────────────────────────────────────────

export const QUIZ_VERSION = '1.0';
export const QUIZ_QUESTION_COUNT = 10;

export type QuizAnswer = 'a' | 'b' | 'c' | 'd';

/** Question number (1-10) to selected answer. */
export type QuizResponses = Record<number, QuizAnswer>;

// ─────────────────────────────────────────────────────────────────────────────────
// LIVE STATE ACTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ChatMessageAction {
  type: 'chat_message';
  content?: string;
  mood?: Mood;
  stressorDetected?: string;
  crisisDetected?: boolean;
}

export interface BreathingExerciseAction {
  type: 'breathing_exercise';
  technique?: string;
  afterMood?: string;
  moodImprovement?: string;
  sessionQuality?: string;
  completed?: boolean;
  pausedTimes?: number;
}

export interface GroundingTechniqueAction {
  type: 'grounding_technique';
  techniqueUsed?: string;
  afterMood?: string;
  moodImprovement?: string;
  currentStressLevel?: string;
  environmentType?: string;
}

export interface MindfulnessMeditationAction {
  type: 'mindfulness_meditation';
  techniqueUsed?: string;
  moodAfter?: string;
  moodImprovement?: string;
  sessionQuality?: string;
  completed?: boolean;
  pauseCount?: number;
  completionRate?: number;
}

export interface BodyRelaxationAction {
  type: 'body_relaxation';
  toolUsed?: string;
  moodAfter?: string;
  moodImprovement?: string;
  sessionQuality?: string;
  hasVeryTenseTensionAreas?: boolean;
}

export interface ToolUseAction {
  type: 'tool_use';
  toolName?: string;
}

export interface SleepLogAction {
  type: 'sleep_log';
  hours?: number;
  quality?: string;
}

export type LiveStateAction =
  | ChatMessageAction
  | BreathingExerciseAction
  | GroundingTechniqueAction
  | MindfulnessMeditationAction
  | BodyRelaxationAction
  | ToolUseAction
  | SleepLogAction;

export type LiveStateActionType = LiveStateAction['type'];
