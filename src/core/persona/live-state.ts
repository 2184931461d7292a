// ═══════════════════════════════════════════════════════════════════════════════
// LIVE STATE — Pure Transition Function over User Actions
// ═══════════════════════════════════════════════════════════════════════════════
//
// applyAction(state, action) → next state. Never mutates its input; the
// caller persists the returned snapshot.
//
// Check-in rules:
//   - crisis detected in chat           → needsCheckIn = true
//   - struggle signals from a session   → needsCheckIn = true
//   - poor sleep (< 5h or poor quality) → needsCheckIn = true
//   - 2+ negative moods in a row        → needsCheckIn = true
//   - reported improvement              → needsCheckIn = false
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  NEGATIVE_MOODS,
  RECENT_LIST_CAP,
  isMood,
  type InteractionKind,
  type LiveStateAction,
  type LiveUserState,
  type Mood,
} from './types.js';

const SUSTAINED_NEGATIVE_THRESHOLD = 2;
const POOR_SLEEP_HOURS = 5;
const POOR_SLEEP_QUALITIES = new Set(['poor', 'very poor']);
const HIGH_STRESS_LEVELS = new Set(['High', 'Very High']);

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Appends unless already present, then evicts from the front down to the cap.
 */
export function pushCapped(list: readonly string[], item: string, cap: number = RECENT_LIST_CAP): string[] {
  if (list.includes(item)) return [...list];
  const next = [...list, item];
  return next.length > cap ? next.slice(next.length - cap) : next;
}

function parseMood(value: string | undefined): Mood | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isMood(normalized) ? normalized : undefined;
}

/**
 * Mutable working copy for a single transition.
 */
interface Draft {
  state: LiveUserState;
  moodReported?: Mood;
  copingSuccess: boolean;
}

function touch(draft: Draft, kind: InteractionKind): void {
  draft.state.lastInteraction = kind;
}

function reportMood(draft: Draft, mood: Mood | undefined): void {
  if (!mood) return;
  draft.state.currentMood = mood;
  draft.moodReported = mood;
}

function recordSuccess(draft: Draft, summary: string, improved: boolean): void {
  draft.state.copingSuccesses = pushCapped(draft.state.copingSuccesses, summary);
  draft.copingSuccess = true;
  if (improved) draft.state.needsCheckIn = false;
}

function recordStressor(draft: Draft, stressor: string): void {
  draft.state.recentStressors = pushCapped(draft.state.recentStressors, stressor);
}

function isImprovement(moodImprovement: string | undefined, sessionQuality?: string): boolean {
  return moodImprovement === 'Improved' || sessionQuality === 'Excellent';
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSITIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function applyAction(
  current: LiveUserState,
  action: LiveStateAction,
  now: Date = new Date()
): LiveUserState {
  const draft: Draft = {
    state: {
      ...current,
      recentStressors: [...current.recentStressors],
      copingSuccesses: [...current.copingSuccesses],
    },
    copingSuccess: false,
  };
  const state = draft.state;

  switch (action.type) {
    case 'chat_message': {
      state.chatMessageCount += 1;
      touch(draft, 'chat');
      reportMood(draft, action.mood);

      if (action.content && action.content.toLowerCase().includes('stress')) {
        recordStressor(draft, action.stressorDetected ?? 'general stress');
      }
      if (action.crisisDetected) {
        state.needsCheckIn = true;
      }
      break;
    }

    case 'tool_use': {
      state.toolUsageCount += 1;
      touch(draft, 'tool_use');
      recordSuccess(draft, `Used ${action.toolName ?? 'unknown tool'}`, false);
      break;
    }

    case 'sleep_log': {
      state.sleepLogCount += 1;
      touch(draft, 'sleep_log');

      const hours = action.hours ?? 7;
      const quality = (action.quality ?? 'good').toLowerCase();
      if (hours < POOR_SLEEP_HOURS || POOR_SLEEP_QUALITIES.has(quality)) {
        state.needsCheckIn = true;
      }
      break;
    }

    case 'breathing_exercise': {
      state.toolUsageCount += 1;
      touch(draft, 'breathing_exercise');
      reportMood(draft, parseMood(action.afterMood));

      const technique = action.technique ?? 'Breathing Exercise';
      if (action.moodImprovement === 'Improved') {
        recordSuccess(draft, `${technique} - Improved mood`, true);
      }

      const struggled =
        action.sessionQuality === 'Needs Improvement' ||
        (!action.completed && (action.pausedTimes ?? 0) > 3);
      if (struggled) {
        state.needsCheckIn = true;
        recordStressor(draft, `Difficulty with ${technique}`);
      }
      break;
    }

    case 'grounding_technique': {
      state.toolUsageCount += 1;
      touch(draft, 'grounding_technique');
      reportMood(draft, parseMood(action.afterMood));

      const technique = action.techniqueUsed ?? 'Grounding Technique';
      if (action.moodImprovement === 'Improved') {
        recordSuccess(draft, `${technique} - Helped with grounding`, true);
      }

      if (action.currentStressLevel && HIGH_STRESS_LEVELS.has(action.currentStressLevel)) {
        state.needsCheckIn = true;
        recordStressor(draft, `High stress in ${action.environmentType ?? 'general situation'}`);
      }
      break;
    }

    case 'mindfulness_meditation': {
      state.toolUsageCount += 1;
      touch(draft, 'mindfulness_meditation');
      reportMood(draft, parseMood(action.moodAfter));

      const technique = action.techniqueUsed ?? 'Meditation';
      if (isImprovement(action.moodImprovement, action.sessionQuality)) {
        recordSuccess(draft, `${technique} meditation`, true);
      }

      const completionRate = action.completionRate ?? 100;
      if (!action.completed && (action.pauseCount ?? 0) > 2 && completionRate < 50) {
        state.needsCheckIn = true;
        recordStressor(draft, `Difficulty maintaining focus during ${technique}`);
      }
      break;
    }

    case 'body_relaxation': {
      state.toolUsageCount += 1;
      touch(draft, 'body_relaxation');
      reportMood(draft, parseMood(action.moodAfter));

      const tool = action.toolUsed ?? 'Body Relaxation';
      if (isImprovement(action.moodImprovement, action.sessionQuality)) {
        recordSuccess(draft, tool, true);
      }

      if (tool === 'Body Mapping' && action.hasVeryTenseTensionAreas) {
        recordStressor(draft, 'Significant body tension detected');
      }
      break;
    }

    default: {
      const unhandled: never = action;
      throw new Error(`Unhandled live state action: ${JSON.stringify(unhandled)}`);
    }
  }

  applySustainedDifficulty(draft);

  const timestamp = now.toISOString();
  state.lastInteractionAt = timestamp;
  state.updatedAt = timestamp;

  return state;
}

function applySustainedDifficulty(draft: Draft): void {
  const state = draft.state;

  if (draft.copingSuccess) {
    state.consecutiveNegativeMoods = 0;
    return;
  }

  if (draft.moodReported === undefined) return;

  if (NEGATIVE_MOODS.has(draft.moodReported)) {
    state.consecutiveNegativeMoods += 1;
    if (state.consecutiveNegativeMoods >= SUSTAINED_NEGATIVE_THRESHOLD) {
      state.needsCheckIn = true;
    }
  } else {
    state.consecutiveNegativeMoods = 0;
  }
}
