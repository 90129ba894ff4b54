import type { Interaction, Intensity, Technique, ConditionClassification } from '../../shared/types';
import { TECHNIQUES } from '../../shared/types';
import type {
  EmotionCount,
  EmotionalValence,
  EngagementTrend,
  IntensityTrend,
  LedgerMetrics,
  ProgressIndicator,
  SessionMetrics,
  TechniqueEffectiveness,
} from './schema';

/** Emotions that call for the letting-go technique and count as "not improved". */
export const NEGATIVE_EMOTIONS: ReadonlySet<string> = new Set([
  'anger',
  'fear',
  'sadness',
  'disgust',
  'anxiety',
  'stress',
]);

const POSITIVE_VALENCE: ReadonlySet<string> = new Set([
  'joy',
  'happiness',
  'happy',
  'excitement',
  'gratitude',
  'contentment',
  'hope',
  'calm',
  'relief',
]);

const NEGATIVE_VALENCE: ReadonlySet<string> = new Set([
  ...NEGATIVE_EMOTIONS,
  'frustration',
  'guilt',
  'shame',
  'loneliness',
]);

const INTENSITY_SCORE: Record<Intensity, number> = { low: 1, medium: 2, high: 3 };

export const ENGAGEMENT_TOLERANCE = 0.05;
export const INTENSITY_SLOPE_THRESHOLD = 0.1;
export const PROGRESS_STEP = 10;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isNegativeEmotion(tag: string | null): boolean {
  return tag !== null && NEGATIVE_EMOTIONS.has(tag);
}

// ============================================================================
// Emotional trend
// ============================================================================

/**
 * Emotion tallies ordered by count, ties in first-seen order. Percentages are
 * relative to interactions that carry a tag.
 */
export function emotionalTrend(interactions: readonly Interaction[]): EmotionCount[] {
  const counts = new Map<string, number>();
  let tagged = 0;

  for (const interaction of interactions) {
    if (interaction.emotionTag === null) continue;
    tagged++;
    counts.set(interaction.emotionTag, (counts.get(interaction.emotionTag) ?? 0) + 1);
  }

  // Map iteration is insertion order and Array.prototype.sort is stable
  return [...counts.entries()]
    .map(([emotion, count]) => ({
      emotion,
      count,
      percentage: round2((count / tagged) * 100),
    }))
    .sort((a, b) => b.count - a.count);
}

export function dominantEmotions(interactions: readonly Interaction[], top: number = 3): string[] {
  return emotionalTrend(interactions).slice(0, top).map((e) => e.emotion);
}

// ============================================================================
// Techniques
// ============================================================================

export function techniqueUsage(interactions: readonly Interaction[]): Record<Technique, number> {
  const usage: Record<Technique, number> = { standard: 0, letting_go: 0 };
  for (const interaction of interactions) {
    usage[interaction.techniqueUsed]++;
  }
  return usage;
}

/**
 * Each transition between consecutive interactions is credited to the
 * technique of the later one, the reply given to the emotion just measured.
 * A transition improved when it left the negative set.
 */
export function techniqueEffectiveness(
  interactions: readonly Interaction[]
): Record<Technique, TechniqueEffectiveness> {
  return techniqueEffectivenessAcross([interactions]);
}

/** Like `techniqueEffectiveness`, but never pairs interactions of different ledgers. */
export function techniqueEffectivenessAcross(
  ledgers: readonly (readonly Interaction[])[]
): Record<Technique, TechniqueEffectiveness> {
  const tally: Record<Technique, { improved: number; total: number }> = {
    standard: { improved: 0, total: 0 },
    letting_go: { improved: 0, total: 0 },
  };

  for (const interactions of ledgers) {
    for (let i = 1; i < interactions.length; i++) {
      const before = interactions[i - 1];
      const current = interactions[i];
      if (!before || !current) continue;

      const entry = tally[current.techniqueUsed];
      entry.total++;
      if (isNegativeEmotion(before.emotionTag) && !isNegativeEmotion(current.emotionTag)) {
        entry.improved++;
      }
    }
  }

  const result: Record<Technique, TechniqueEffectiveness> = {
    standard: { improved: 0, total: 0, effectiveness: null },
    letting_go: { improved: 0, total: 0, effectiveness: null },
  };

  for (const technique of TECHNIQUES) {
    const { improved, total } = tally[technique];
    result[technique] = {
      improved,
      total,
      effectiveness: total === 0 ? null : round2((improved / total) * 100),
    };
  }

  return result;
}

// ============================================================================
// Progress
// ============================================================================

export function progressPercentage(lettingGoCount: number): number {
  return Math.max(0, Math.min(100, PROGRESS_STEP * lettingGoCount));
}

export function ledgerProgress(interactions: readonly Interaction[]): number {
  return progressPercentage(techniqueUsage(interactions).letting_go);
}

// ============================================================================
// Engagement
// ============================================================================

function meanLength(interactions: readonly Interaction[]): number {
  if (interactions.length === 0) return 0;
  const total = interactions.reduce((sum, i) => sum + i.userMessage.length, 0);
  return total / interactions.length;
}

export function engagementTrend(
  interactions: readonly Interaction[],
  tolerance: number = ENGAGEMENT_TOLERANCE
): EngagementTrend {
  if (interactions.length < 2) return 'stable';

  const half = Math.floor(interactions.length / 2);
  const first = meanLength(interactions.slice(0, half));
  const second = meanLength(interactions.slice(half));

  if (first === 0) {
    return second === 0 ? 'stable' : 'increasing';
  }

  const change = (second - first) / first;
  if (Math.abs(change) <= tolerance) return 'stable';
  return change > 0 ? 'increasing' : 'decreasing';
}

export function averageMessageLength(interactions: readonly Interaction[]): number {
  return round2(meanLength(interactions));
}

/** Mean seconds between consecutive interactions, null below two. */
export function averageResponseTimeSeconds(interactions: readonly Interaction[]): number | null {
  if (interactions.length < 2) return null;

  let totalMs = 0;
  for (let i = 1; i < interactions.length; i++) {
    const before = interactions[i - 1];
    const current = interactions[i];
    if (!before || !current) continue;
    totalMs += Date.parse(current.timestamp) - Date.parse(before.timestamp);
  }

  return round2(totalMs / 1000 / (interactions.length - 1));
}

// ============================================================================
// Valence & indicators
// ============================================================================

export function emotionalValence(interactions: readonly Interaction[]): EmotionalValence {
  let positive = 0;
  let negative = 0;
  let tagged = 0;

  for (const { emotionTag } of interactions) {
    if (emotionTag === null) continue;
    tagged++;
    if (POSITIVE_VALENCE.has(emotionTag)) positive++;
    else if (NEGATIVE_VALENCE.has(emotionTag)) negative++;
  }

  if (tagged === 0) {
    return { positive: 0, negative: 0, neutral: 0 };
  }

  return {
    positive: round2(positive / tagged),
    negative: round2(negative / tagged),
    neutral: round2((tagged - positive - negative) / tagged),
  };
}

export function progressIndicators(interactions: readonly Interaction[]): ProgressIndicator[] {
  const indicators: ProgressIndicator[] = [];

  if (interactions.length >= 2) {
    const half = Math.floor(interactions.length / 2);
    const first = emotionalValence(interactions.slice(0, half));
    const second = emotionalValence(interactions.slice(half));

    if (second.positive > first.positive) indicators.push('positive_emotions_increased');
    if (second.negative < first.negative) indicators.push('negative_emotions_decreased');
  }

  if (interactions.length > 5) indicators.push('sustained_engagement');

  return indicators;
}

/**
 * Least-squares slope of intensity scores (low=1, medium=2, high=3) over
 * their order of appearance.
 */
export function intensityTrend(interactions: readonly Interaction[]): IntensityTrend {
  const scores: number[] = [];
  for (const { metadata } of interactions) {
    if (metadata.intensity) scores.push(INTENSITY_SCORE[metadata.intensity]);
  }

  if (scores.length < 2) return 'insufficient_data';

  const n = scores.length;
  const meanX = (n - 1) / 2;
  const meanY = scores.reduce((a, b) => a + b, 0) / n;

  let numerator = 0;
  let denominator = 0;
  scores.forEach((y, x) => {
    numerator += (x - meanX) * (y - meanY);
    denominator += (x - meanX) ** 2;
  });

  const slope = numerator / denominator;
  if (slope > INTENSITY_SLOPE_THRESHOLD) return 'increasing_intensity';
  if (slope < -INTENSITY_SLOPE_THRESHOLD) return 'decreasing_intensity';
  return 'stable_intensity';
}

// ============================================================================
// Aggregates
// ============================================================================

export function computeLedgerMetrics(interactions: readonly Interaction[]): LedgerMetrics {
  return {
    interactionCount: interactions.length,
    emotionalTrend: emotionalTrend(interactions),
    techniqueUsage: techniqueUsage(interactions),
    techniqueEffectiveness: techniqueEffectiveness(interactions),
    progressPercentage: ledgerProgress(interactions),
    engagementTrend: engagementTrend(interactions),
    emotionalValence: emotionalValence(interactions),
    averageMessageLength: averageMessageLength(interactions),
    averageResponseTimeSeconds: averageResponseTimeSeconds(interactions),
    intensityTrend: intensityTrend(interactions),
    progressIndicators: progressIndicators(interactions),
  };
}

export function computeSessionMetrics(input: {
  interactions: readonly Interaction[];
  conditionClassifications: readonly ConditionClassification[];
  startTime: Date;
  endTime: Date;
}): SessionMetrics {
  const durationMinutes = Math.max(0, (input.endTime.getTime() - input.startTime.getTime()) / 60000);

  return {
    ...computeLedgerMetrics(input.interactions),
    durationMinutes: round2(durationMinutes),
    latestClassification: input.conditionClassifications.at(-1) ?? null,
  };
}

/** One-paragraph synopsis stored on the session at close. */
export function summarizeSession(metrics: SessionMetrics): string {
  const minutes = Math.round(metrics.durationMinutes);
  const emotions = metrics.emotionalTrend.slice(0, 3).map((e) => e.emotion);

  const parts = [
    `Session lasted ${minutes} minutes with ${metrics.interactionCount} interactions.`,
    emotions.length > 0
      ? `Dominant emotions: ${emotions.join(', ')}.`
      : 'No emotions were recorded.',
  ];

  if (metrics.latestClassification) {
    parts.push(`Psychological assessment indicates ${metrics.latestClassification}.`);
  }

  if (metrics.techniqueUsage.letting_go > 0) {
    parts.push(`Letting-go technique used ${metrics.techniqueUsage.letting_go} times.`);
  }

  return parts.join(' ');
}
