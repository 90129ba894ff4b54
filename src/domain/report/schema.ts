import { z } from 'zod';
import { CONDITION_CLASSIFICATIONS, REPORT_TYPES } from '../../shared/types';
import {
  emotionCountSchema,
  emotionalValenceSchema,
  engagementTrendSchema,
  intensityTrendSchema,
  progressIndicatorSchema,
  techniqueEffectivenessSchema,
  techniqueTableSchema,
} from '../analytics/schema';

export const TREATMENT_STAGES = [
  'early_stage',
  'progressing',
  'stable',
  'improving',
  'worsening',
  'maintenance',
] as const;
export type TreatmentStage = (typeof TREATMENT_STAGES)[number];

export const SEVERITIES = ['mild', 'moderate', 'severe', 'in_remission'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const progressNarrativeSchema = z.object({
  reportType: z.literal('progress'),
  overallAssessment: z.string(),
  progressIndicators: z.array(z.string()),
  areasOfConcern: z.array(z.string()),
  emotionalPatterns: z.string(),
  interventionEffectiveness: z.string(),
  recommendations: z.array(z.string()),
  treatmentStage: z.enum(TREATMENT_STAGES),
});
export type ProgressNarrative = z.infer<typeof progressNarrativeSchema>;

export const assessmentNarrativeSchema = z.object({
  reportType: z.literal('assessment'),
  psychologicalEvaluation: z.string(),
  symptomProgression: z.string(),
  corePatterns: z.array(z.string()),
  riskFactors: z.array(z.string()),
  protectiveFactors: z.array(z.string()),
  treatmentResponse: z.string(),
  prognosis: z.string(),
  treatmentRecommendations: z.array(z.string()),
  effectiveInterventions: z.array(z.string()),
  conditionSeverity: z.enum(SEVERITIES),
  treatmentStage: z.enum(TREATMENT_STAGES),
});
export type AssessmentNarrative = z.infer<typeof assessmentNarrativeSchema>;

export const reportNarrativeSchema = z.discriminatedUnion('reportType', [
  progressNarrativeSchema,
  assessmentNarrativeSchema,
]);
export type ReportNarrative = z.infer<typeof reportNarrativeSchema>;

export const reportMetricsSchema = z.object({
  sessionCount: z.number().int().nonnegative(),
  interactionCount: z.number().int().nonnegative(),
  firstSessionDate: z.string().nullable(),
  lastSessionDate: z.string().nullable(),
  emotionalTrend: z.array(emotionCountSchema),
  techniqueUsage: techniqueTableSchema(z.number().int().nonnegative()),
  techniqueEffectiveness: techniqueTableSchema(techniqueEffectivenessSchema),
  progressPercentage: z.number().min(0).max(100),
  engagementTrend: engagementTrendSchema,
  emotionalValence: emotionalValenceSchema,
  progressIndicators: z.array(progressIndicatorSchema),
  conditionClassifications: z.array(z.enum(CONDITION_CLASSIFICATIONS)),
  latestClassification: z.enum(CONDITION_CLASSIFICATIONS).nullable(),
  intensityTrend: intensityTrendSchema.optional(),
});
export type ReportMetrics = z.infer<typeof reportMetricsSchema>;

export const reportSchema = z.object({
  reportId: z.string(),
  patientId: z.string(),
  creationDate: z.string(),
  reportType: z.enum(REPORT_TYPES),
  content: reportNarrativeSchema,
  narrativeSource: z.enum(['generated', 'fallback']),
  metrics: reportMetricsSchema,
  sessionIds: z.array(z.string()),
});
export type Report = z.infer<typeof reportSchema>;
