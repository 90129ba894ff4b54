import { z } from 'zod';
import {
  INTENSITIES,
  isConditionClassification,
  isLanguage,
  type ConditionClassification,
  type EmotionAnalysis,
  type ReportType,
} from '../../shared/types';
import { err, ok, ParseError, type Result } from '../../shared/result';
import {
  SEVERITIES,
  TREATMENT_STAGES,
  type AssessmentNarrative,
  type ProgressNarrative,
  type ReportNarrative,
} from '../report/schema';

/**
 * Model output may arrive wrapped in markdown fences or with prose around
 * the JSON object.
 */
export function extractJson(raw: string): Result<unknown, ParseError> {
  let content = raw.trim();

  const fenceMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch?.[1]) {
    content = fenceMatch[1].trim();
  } else {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start !== -1 && end > start) {
      content = content.slice(start, end + 1);
    }
  }

  try {
    return ok(JSON.parse(content));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ParseError(`Invalid JSON: ${message}`, raw));
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): Result<T, ParseError> {
  const json = extractJson(raw);
  if (!json.ok) return json;

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    return err(new ParseError(parsed.error.message, raw));
  }
  return ok(parsed.data);
}

// ============================================================================
// Emotion
// ============================================================================

const emotionResponseSchema = z.object({
  emotion: z.string().min(1).transform((s) => s.trim().toLowerCase()),
  intensity: z.string().optional().nullable()
    .transform((s) => INTENSITIES.find((i) => i === s?.trim().toLowerCase()) ?? null),
  language: z.string().optional().nullable()
    .transform((s) => {
      const code = s?.trim().toLowerCase() ?? '';
      return isLanguage(code) ? code : null;
    }),
});

export function parseEmotion(raw: string): Result<EmotionAnalysis, ParseError> {
  const parsed = parseWith(emotionResponseSchema, raw);
  if (!parsed.ok) return parsed;

  return ok({
    emotionTag: parsed.value.emotion,
    intensity: parsed.value.intensity,
    detectedLanguage: parsed.value.language,
  });
}

export function unknownEmotion(): EmotionAnalysis {
  return { emotionTag: 'unknown', intensity: null, detectedLanguage: null };
}

// ============================================================================
// Condition classification
// ============================================================================

/**
 * Accepts a bare label ("ptsd"), a label with punctuation or spacing
 * ("General stress."), or a JSON object carrying a "condition" field.
 */
export function parseClassification(raw: string): Result<ConditionClassification, ParseError> {
  const trimmed = raw.trim();

  let candidate = trimmed;
  if (trimmed.startsWith('{') || trimmed.startsWith('```')) {
    const json = parseWith(z.object({ condition: z.string() }), trimmed);
    if (!json.ok) return json;
    candidate = json.value.condition;
  }

  const normalized = candidate
    .toLowerCase()
    .replace(/[.!"'`]/g, '')
    .trim()
    .replace(/[\s-]+/g, '_');

  if (isConditionClassification(normalized)) {
    return ok(normalized);
  }
  return err(new ParseError(`Unknown condition label: ${candidate}`, raw));
}

// ============================================================================
// Report narratives
// ============================================================================

const stringList = z.union([z.array(z.string()), z.string().transform((s) => [s])]).default([]);

const progressResponseSchema = z.object({
  overall_assessment: z.string(),
  progress_indicators: stringList,
  areas_of_concern: stringList,
  emotional_patterns: z.string().default(''),
  intervention_effectiveness: z.string().default(''),
  recommendations: stringList,
  treatment_stage: z.enum(TREATMENT_STAGES).catch('early_stage'),
}).transform((r): ProgressNarrative => ({
  reportType: 'progress',
  overallAssessment: r.overall_assessment,
  progressIndicators: r.progress_indicators,
  areasOfConcern: r.areas_of_concern,
  emotionalPatterns: r.emotional_patterns,
  interventionEffectiveness: r.intervention_effectiveness,
  recommendations: r.recommendations,
  treatmentStage: r.treatment_stage,
}));

const assessmentResponseSchema = z.object({
  psychological_evaluation: z.string(),
  symptom_progression: z.string().default(''),
  core_patterns: stringList,
  risk_factors: stringList,
  protective_factors: stringList,
  treatment_response: z.string().default(''),
  prognosis: z.string().default(''),
  treatment_recommendations: stringList,
  effective_interventions: stringList,
  condition_severity: z.enum(SEVERITIES).catch('moderate'),
  treatment_stage: z.enum(TREATMENT_STAGES).catch('early_stage'),
}).transform((r): AssessmentNarrative => ({
  reportType: 'assessment',
  psychologicalEvaluation: r.psychological_evaluation,
  symptomProgression: r.symptom_progression,
  corePatterns: r.core_patterns,
  riskFactors: r.risk_factors,
  protectiveFactors: r.protective_factors,
  treatmentResponse: r.treatment_response,
  prognosis: r.prognosis,
  treatmentRecommendations: r.treatment_recommendations,
  effectiveInterventions: r.effective_interventions,
  conditionSeverity: r.condition_severity,
  treatmentStage: r.treatment_stage,
}));

export function parseNarrative(reportType: ReportType, raw: string): Result<ReportNarrative, ParseError> {
  return reportType === 'progress'
    ? parseWith(progressResponseSchema, raw)
    : parseWith(assessmentResponseSchema, raw);
}
