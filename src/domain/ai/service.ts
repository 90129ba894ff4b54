import Anthropic from '@anthropic-ai/sdk';
import type { Logger } from 'pino';
import {
  CONDITION_CLASSIFICATIONS,
  type EmotionAnalysis,
  type Interaction,
  type LanguageUnderstandingService,
  type ReplyRequest,
  type ReportSynthesisRequest,
} from '../../shared/types';
import { LanguageServiceError } from '../../shared/errors';
import { RateLimiter } from '../../shared/rate-limiter';
import { unwrapOr } from '../../shared/result';
import { logAIUsage } from '../../infra/logging/logger';
import { parseEmotion, unknownEmotion } from './parsing';
import { SEVERITIES, TREATMENT_STAGES } from '../report/schema';

export interface AnthropicLanguageServiceOptions {
  apiKey: string;
  model: string;
  fastModel: string;
  rpmLimit: number;
  logger: Logger;
  client?: Anthropic;
}

const LANGUAGE_NAMES = { en: 'English', ar: 'Arabic' } as const;

const TECHNIQUE_GUIDANCE = {
  standard: 'Respond with warmth and empathy. Reflect what the person said and invite them to share more.',
  letting_go: 'The person is experiencing a difficult emotion. Gently guide them toward noticing the feeling, allowing it, and considering letting it go.',
} as const;

function transcript(interactions: readonly Interaction[]): string {
  return interactions
    .map((i) => `User: ${i.userMessage}\nEmotion: ${i.emotionTag ?? 'none'}\nAssistant: ${i.botResponse}`)
    .join('\n\n');
}

/**
 * Language understanding backed by the Anthropic Messages API. Transport
 * failures surface as LanguageServiceError; callers supply the fallbacks.
 */
export class AnthropicLanguageService implements LanguageUnderstandingService {
  private client: Anthropic;
  private rateLimiter: RateLimiter;
  private model: string;
  private fastModel: string;
  private logger: Logger;

  constructor(options: AnthropicLanguageServiceOptions) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.rateLimiter = new RateLimiter({ maxRequestsPerMinute: options.rpmLimit });
    this.model = options.model;
    this.fastModel = options.fastModel;
    this.logger = options.logger.child({ component: 'language-service' });
  }

  async analyzeEmotion(text: string): Promise<EmotionAnalysis> {
    const raw = await this.complete('analyze_emotion', {
      model: this.fastModel,
      maxTokens: 100,
      messages: [{
        role: 'user',
        content: `Identify the dominant emotion in the message below.

Respond with ONLY a JSON object: {"emotion": "<one lower-case word, e.g. sadness, anxiety, joy, anger, fear, stress, calm>", "intensity": "low" | "medium" | "high", "language": "en" | "ar"}

MESSAGE:
${text}`,
      }],
    });

    return unwrapOr(parseEmotion(raw), (parseError) => {
      this.logger.warn({ error: parseError.message }, 'Unparsable emotion analysis');
      return unknownEmotion();
    });
  }

  async generateReply(request: ReplyRequest): Promise<string> {
    const system = [
      'You are Mindline, a supportive companion for emotional wellbeing. You are not a doctor and never diagnose.',
      `Always answer in ${LANGUAGE_NAMES[request.language]}.`,
      request.patientName ? `The person's name is ${request.patientName}.` : '',
      request.condition !== 'unknown' ? `They asked for support with ${request.condition}.` : '',
      request.emotionTag ? `Their current emotion appears to be ${request.emotionTag}.` : '',
      TECHNIQUE_GUIDANCE[request.techniqueHint],
      'Keep the answer under 120 words.',
    ].filter(Boolean).join('\n');

    const messages: Anthropic.MessageParam[] = [];
    for (const turn of request.history ?? []) {
      messages.push({ role: 'user', content: turn.userMessage });
      messages.push({ role: 'assistant', content: turn.botResponse });
    }
    messages.push({ role: 'user', content: request.text });

    const reply = await this.complete('generate_reply', {
      model: this.model,
      maxTokens: 400,
      system,
      messages,
    });

    if (reply.length === 0) {
      throw new LanguageServiceError('Empty reply');
    }
    return reply;
  }

  async classifyCondition(recentInteractions: readonly Interaction[]): Promise<string> {
    return this.complete('classify_condition', {
      model: this.fastModel,
      maxTokens: 20,
      messages: [{
        role: 'user',
        content: `Based on the conversation below, which label best fits the person's presentation?

LABELS: ${CONDITION_CLASSIFICATIONS.join(', ')}

Answer with ONLY one label. Use "unclear" when there is not enough information.

CONVERSATION:
${transcript(recentInteractions)}`,
      }],
    });
  }

  async synthesizeReport(request: ReportSynthesisRequest): Promise<string> {
    const fields = request.reportType === 'progress'
      ? `{"overall_assessment": string, "progress_indicators": string[], "areas_of_concern": string[], "emotional_patterns": string, "intervention_effectiveness": string, "recommendations": string[], "treatment_stage": ${TREATMENT_STAGES.map((s) => `"${s}"`).join(' | ')}}`
      : `{"psychological_evaluation": string, "symptom_progression": string, "core_patterns": string[], "risk_factors": string[], "protective_factors": string[], "treatment_response": string, "prognosis": string, "treatment_recommendations": string[], "effective_interventions": string[], "condition_severity": ${SEVERITIES.map((s) => `"${s}"`).join(' | ')}, "treatment_stage": ${TREATMENT_STAGES.map((s) => `"${s}"`).join(' | ')}}`;

    return this.complete(`synthesize_${request.reportType}_report`, {
      model: this.model,
      maxTokens: 1500,
      messages: [{
        role: 'user',
        content: `Write a ${request.reportType} report for a person using a supportive wellbeing companion. Write the text values in ${LANGUAGE_NAMES[request.language]}.

PROFILE:
${JSON.stringify(request.patient)}

METRICS:
${JSON.stringify(request.metrics)}

CONVERSATION SAMPLE:
${transcript(request.interactions)}

Respond with ONLY a JSON object of this shape:
${fields}`,
      }],
    });
  }

  private async complete(
    operation: string,
    params: { model: string; maxTokens: number; system?: string; messages: Anthropic.MessageParam[] }
  ): Promise<string> {
    await this.rateLimiter.acquire();
    const startTime = Date.now();

    try {
      const response = await this.client.messages.create({
        model: params.model,
        max_tokens: params.maxTokens,
        ...(params.system && { system: params.system }),
        messages: params.messages,
      });

      logAIUsage({
        operation,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        latencyMs: Date.now() - startTime,
      }, this.logger);

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') parts.push(block.text);
      }
      return parts.join('\n').trim();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      if (err.message.includes('429') || err.message.includes('rate_limit')) {
        throw new LanguageServiceError('Rate limit exceeded, please try again later', err);
      }
      throw new LanguageServiceError(`${operation}: ${err.message}`, err);
    }
  }
}
