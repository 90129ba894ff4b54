import { z } from 'zod';
import { CONDITION_CLASSIFICATIONS } from '../../shared/types';

export const engagementTrendSchema = z.enum(['increasing', 'decreasing', 'stable']);
export type EngagementTrend = z.infer<typeof engagementTrendSchema>;

export const intensityTrendSchema = z.enum([
  'increasing_intensity',
  'decreasing_intensity',
  'stable_intensity',
  'insufficient_data',
]);
export type IntensityTrend = z.infer<typeof intensityTrendSchema>;

export const progressIndicatorSchema = z.enum([
  'positive_emotions_increased',
  'negative_emotions_decreased',
  'sustained_engagement',
]);
export type ProgressIndicator = z.infer<typeof progressIndicatorSchema>;

export const emotionCountSchema = z.object({
  emotion: z.string(),
  count: z.number().int().nonnegative(),
  percentage: z.number(),
});
export type EmotionCount = z.infer<typeof emotionCountSchema>;

export const techniqueEffectivenessSchema = z.object({
  improved: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  effectiveness: z.number().nullable(),
});
export type TechniqueEffectiveness = z.infer<typeof techniqueEffectivenessSchema>;

export const techniqueTableSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ standard: value, letting_go: value });

export const emotionalValenceSchema = z.object({
  positive: z.number(),
  negative: z.number(),
  neutral: z.number(),
});
export type EmotionalValence = z.infer<typeof emotionalValenceSchema>;

export const ledgerMetricsSchema = z.object({
  interactionCount: z.number().int().nonnegative(),
  emotionalTrend: z.array(emotionCountSchema),
  techniqueUsage: techniqueTableSchema(z.number().int().nonnegative()),
  techniqueEffectiveness: techniqueTableSchema(techniqueEffectivenessSchema),
  progressPercentage: z.number().min(0).max(100),
  engagementTrend: engagementTrendSchema,
  emotionalValence: emotionalValenceSchema,
  averageMessageLength: z.number().nonnegative(),
  averageResponseTimeSeconds: z.number().nullable(),
  intensityTrend: intensityTrendSchema,
  progressIndicators: z.array(progressIndicatorSchema),
});
export type LedgerMetrics = z.infer<typeof ledgerMetricsSchema>;

export const sessionMetricsSchema = ledgerMetricsSchema.extend({
  durationMinutes: z.number().nonnegative(),
  latestClassification: z.enum(CONDITION_CLASSIFICATIONS).nullable(),
});
export type SessionMetrics = z.infer<typeof sessionMetricsSchema>;
