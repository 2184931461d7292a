// ═══════════════════════════════════════════════════════════════════════════════
// PERSONA GENERATOR — Quiz Answers → PersonalityProfile
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two implementations:
//   - RuleBasedPersonaGenerator: deterministic, offline, used by default
//   - LlmPersonaGenerator: asks the chat model for the profile as JSON
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import { GenerationFailureError } from '../errors.js';
import { tryCatch } from '../../types/result.js';
import { getLogger } from '../../logging/index.js';
import type { ModelConfig } from '../../config/index.js';
import {
  getOpenAIClient,
  stripCodeFence,
  type ChatCompletionClient,
} from '../../providers/openai-client.js';
import {
  COMMUNICATION_STYLES,
  PRIMARY_STRESSORS,
  SOCIAL_PROFILES,
  COPING_MECHANISMS,
  STRESS_LEVELS,
  QUIZ_VERSION,
  type PersonalityProfile,
  type QuizResponses,
} from './types.js';
import {
  analyzeQuiz,
  determineCommunicationStyle,
  determinePrimaryStressor,
  determineSocialProfile,
  determineCopingMechanism,
  assessStressLevel,
  formatQuizForAnalysis,
} from './analyzer.js';
import {
  buildSystemPrompt,
  describeMethodology,
  describeTone,
  deriveProactiveTriggers,
  deriveStrengths,
  deriveVulnerabilities,
  recommendApproach,
  type PersonaDimensions,
} from './prompt.js';

const logger = getLogger({ component: 'persona-generator' });

export interface PersonaGenerator {
  readonly name: string;
  generate(responses: QuizResponses): Promise<PersonalityProfile>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RULE-BASED
// ─────────────────────────────────────────────────────────────────────────────────

export class RuleBasedPersonaGenerator implements PersonaGenerator {
  readonly name = 'rule-based';

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async generate(responses: QuizResponses): Promise<PersonalityProfile> {
    const analysis = analyzeQuiz(responses);

    const dimensions: PersonaDimensions = {
      communicationStyle: determineCommunicationStyle(analysis),
      primaryStressor: determinePrimaryStressor(analysis),
      socialProfile: determineSocialProfile(analysis),
      copingMechanism: determineCopingMechanism(analysis),
      stressLevel: assessStressLevel(analysis),
    };

    const proactiveTriggers = deriveProactiveTriggers(dimensions, analysis);

    return {
      ...dimensions,
      strengths: deriveStrengths(dimensions, analysis),
      vulnerabilities: deriveVulnerabilities(dimensions, analysis),
      recommendedApproach: recommendApproach(dimensions.copingMechanism),
      chatbotTone: describeTone(dimensions.communicationStyle),
      chatbotMethodology: describeMethodology(dimensions.copingMechanism),
      proactiveTriggers,
      systemPrompt: buildSystemPrompt(dimensions, proactiveTriggers),
      generatedAt: this.clock().toISOString(),
      quizVersion: QUIZ_VERSION,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM-ASSISTED
// ─────────────────────────────────────────────────────────────────────────────────

const LlmProfileSchema = z.object({
  communicationStyle: z.enum(COMMUNICATION_STYLES),
  primaryStressor: z.enum(PRIMARY_STRESSORS),
  socialProfile: z.enum(SOCIAL_PROFILES),
  copingMechanism: z.enum(COPING_MECHANISMS),
  stressLevel: z.enum(STRESS_LEVELS),
  strengths: z.array(z.string().min(1)).min(2).max(5),
  vulnerabilities: z.array(z.string().min(1)).min(2).max(5),
  recommendedApproach: z.string().min(1),
  chatbotTone: z.string().min(1),
  chatbotMethodology: z.string().min(1),
  proactiveTriggers: z.array(z.string().min(1)).min(2).max(5),
  systemPrompt: z.string().min(1),
});

const PERSONA_ANALYST_PROMPT = `You are an expert clinical psychologist specializing in personality assessment for college students. Analyze the quiz responses and produce a personality profile that will guide a mental wellness chatbot.

Return JSON only, no markdown, with exactly these fields:

{
  "communicationStyle": "logical|emotional|balanced",
  "primaryStressor": "academics|social|sleep|general",
  "socialProfile": "introverted|extroverted|ambiverted",
  "copingMechanism": "analytical|affective|mixed",
  "stressLevel": "low|moderate|high",
  "strengths": ["2-5 items"],
  "vulnerabilities": ["2-5 items"],
  "recommendedApproach": "therapeutic approach, e.g. CBT, ACT, Emotion-Focused",
  "chatbotTone": "tone the chatbot should use",
  "chatbotMethodology": "therapeutic methodology to apply",
  "proactiveTriggers": ["2-5 situations where the chatbot should reach out"],
  "systemPrompt": "complete system prompt (300-500 words) covering identity, tone, methodology, user-specific guidance and crisis handling"
}`;

export interface LlmPersonaGeneratorOptions {
  model: string;
  temperature: number;
}

export class LlmPersonaGenerator implements PersonaGenerator {
  readonly name = 'llm';

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: LlmPersonaGeneratorOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async generate(responses: QuizResponses): Promise<PersonalityProfile> {
    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: PERSONA_ANALYST_PROMPT },
          { role: 'user', content: formatQuizForAnalysis(responses) },
        ],
        temperature: this.options.temperature,
        response_format: { type: 'json_object' },
      });
      content = response.choices[0]?.message?.content?.trim() ?? '';
    } catch (error) {
      throw new GenerationFailureError('persona model request failed', error);
    }

    if (!content) {
      throw new GenerationFailureError('persona model returned no content');
    }

    const json = tryCatch((): unknown => JSON.parse(stripCodeFence(content)));
    if (!json.ok) {
      logger.warn('Persona response was not JSON', { length: content.length });
      throw new GenerationFailureError('persona model returned invalid JSON', json.error);
    }

    const parsed = LlmProfileSchema.safeParse(json.value);
    if (!parsed.success) {
      logger.warn('Persona response failed validation', { issues: parsed.error.issues.length });
      throw new GenerationFailureError('persona model returned an incomplete profile', parsed.error);
    }

    return {
      ...parsed.data,
      generatedAt: this.clock().toISOString(),
      quizVersion: QUIZ_VERSION,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createPersonaGenerator(config: ModelConfig): PersonaGenerator {
  const client = config.llmPersona ? getOpenAIClient(config) : null;
  if (client) {
    return new LlmPersonaGenerator(client, {
      model: config.personaModel,
      temperature: config.temperature,
    });
  }
  return new RuleBasedPersonaGenerator();
}
