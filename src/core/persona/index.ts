// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA MODULE — Quiz Analysis, Profile Generation, Live State
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types.js';

export {
  parseQuizResponses,
  analyzeQuiz,
  determineCommunicationStyle,
  determinePrimaryStressor,
  determineSocialProfile,
  determineCopingMechanism,
  assessStressLevel,
  formatQuizForAnalysis,
  getQuizDefinition,
  type QuizAnalysis,
} from './analyzer.js';

export { buildSystemPrompt, type PersonaDimensions } from './prompt.js';

export {
  RuleBasedPersonaGenerator,
  LlmPersonaGenerator,
  createPersonaGenerator,
  type PersonaGenerator,
} from './generator.js';

export { applyAction, pushCapped } from './live-state.js';
