import { describe, it, expect } from 'vitest';
import {
  averageResponseTimeSeconds,
  computeLedgerMetrics,
  computeSessionMetrics,
  dominantEmotions,
  emotionalTrend,
  emotionalValence,
  engagementTrend,
  intensityTrend,
  ledgerProgress,
  progressIndicators,
  progressPercentage,
  summarizeSession,
  techniqueEffectiveness,
  techniqueUsage,
} from './engine';
import { interaction } from '../../test-utils/fakes';
import type { Intensity } from '../../shared/types';

function withIntensity(level: Intensity) {
  return interaction('sadness', { metadata: { intensity: level } });
}

describe('analytics engine', () => {
  describe('emotional trend', () => {
    it('tallies five tagged interactions without letting-go', () => {
      const ledger = ['sad', 'sad', 'happy', 'sad', 'happy'].map((tag) => interaction(tag));

      expect(emotionalTrend(ledger)).toEqual([
        { emotion: 'sad', count: 3, percentage: 60 },
        { emotion: 'happy', count: 2, percentage: 40 },
      ]);
      expect(ledgerProgress(ledger)).toBe(0);
    });

    it('ignores untagged interactions in the percentages', () => {
      const ledger = [interaction('joy'), interaction(null), interaction('fear'), interaction('joy')];

      expect(emotionalTrend(ledger)).toEqual([
        { emotion: 'joy', count: 2, percentage: 66.67 },
        { emotion: 'fear', count: 1, percentage: 33.33 },
      ]);
    });

    it('keeps first-seen order for ties', () => {
      const ledger = ['stress', 'calm', 'hope'].map((tag) => interaction(tag));
      expect(dominantEmotions(ledger)).toEqual(['stress', 'calm', 'hope']);
    });

    it('is empty for an empty ledger', () => {
      expect(emotionalTrend([])).toEqual([]);
    });
  });

  describe('technique effectiveness', () => {
    it('credits an anxiety to happy move to the letting-go reply', () => {
      const ledger = [
        interaction('calm'),
        interaction('anxiety'),
        interaction('happy', { techniqueUsed: 'letting_go' }),
      ];

      const result = techniqueEffectiveness(ledger);

      expect(result.letting_go).toEqual({ improved: 1, total: 1, effectiveness: 100 });
      expect(result.standard).toEqual({ improved: 0, total: 1, effectiveness: 0 });
    });

    it('is null below two interactions', () => {
      const result = techniqueEffectiveness([interaction('sadness', { techniqueUsed: 'letting_go' })]);

      expect(result.letting_go.effectiveness).toBeNull();
      expect(result.standard.effectiveness).toBeNull();
    });

    it('is null for a technique with no transitions', () => {
      const result = techniqueEffectiveness([interaction('sadness'), interaction('anger')]);

      expect(result.letting_go).toEqual({ improved: 0, total: 0, effectiveness: null });
      expect(result.standard).toEqual({ improved: 0, total: 1, effectiveness: 0 });
    });
  });

  describe('progress percentage', () => {
    it('is ten points per letting-go interaction', () => {
      const ledger = [
        interaction('fear', { techniqueUsed: 'letting_go' }),
        interaction('fear', { techniqueUsed: 'letting_go' }),
        interaction('calm'),
        interaction('anger', { techniqueUsed: 'letting_go' }),
      ];

      expect(techniqueUsage(ledger)).toEqual({ standard: 1, letting_go: 3 });
      expect(ledgerProgress(ledger)).toBe(30);
    });

    it('is clamped to [0, 100]', () => {
      expect(progressPercentage(12)).toBe(100);
      expect(progressPercentage(-1)).toBe(0);
      expect(progressPercentage(0)).toBe(0);
    });
  });

  describe('engagement trend', () => {
    const messages = (...texts: string[]) => texts.map((userMessage) => interaction(null, { userMessage }));

    it('is increasing when later messages are longer', () => {
      expect(engagementTrend(messages('ab', 'ab', 'abcdef', 'abcdef'))).toBe('increasing');
    });

    it('is decreasing when later messages are shorter', () => {
      expect(engagementTrend(messages('abcdef', 'abcdef', 'ab', 'ab'))).toBe('decreasing');
    });

    it('is stable within tolerance and below two interactions', () => {
      expect(engagementTrend(messages('abcd', 'abcd', 'abcd', 'abcd'))).toBe('stable');
      expect(engagementTrend(messages('abcd'))).toBe('stable');
    });
  });

  describe('intensity trend', () => {
    it('detects rising intensity', () => {
      expect(intensityTrend([withIntensity('low'), withIntensity('medium'), withIntensity('high')]))
        .toBe('increasing_intensity');
    });

    it('detects falling intensity', () => {
      expect(intensityTrend([withIntensity('high'), withIntensity('high'), withIntensity('low')]))
        .toBe('decreasing_intensity');
    });

    it('is stable for a flat series', () => {
      expect(intensityTrend([withIntensity('medium'), withIntensity('medium')])).toBe('stable_intensity');
    });

    it('needs two rated interactions', () => {
      expect(intensityTrend([withIntensity('high'), interaction('calm')])).toBe('insufficient_data');
    });
  });

  it('splits valence over tagged interactions', () => {
    const ledger = [interaction('joy'), interaction('sadness'), interaction('curiosity'), interaction(null)];

    expect(emotionalValence(ledger)).toEqual({ positive: 0.33, negative: 0.33, neutral: 0.33 });
    expect(emotionalValence([])).toEqual({ positive: 0, negative: 0, neutral: 0 });
  });

  it('reports progress indicators when the second half improves', () => {
    const ledger = ['sadness', 'sadness', 'sadness', 'joy', 'joy', 'calm'].map((tag) => interaction(tag));

    expect(progressIndicators(ledger)).toEqual([
      'positive_emotions_increased',
      'negative_emotions_decreased',
      'sustained_engagement',
    ]);
  });

  it('averages the gaps between interactions in seconds', () => {
    const ledger = [
      interaction('calm', { timestamp: '2024-03-01T10:00:00.000Z' }),
      interaction('calm', { timestamp: '2024-03-01T10:01:00.000Z' }),
      interaction('calm', { timestamp: '2024-03-01T10:03:00.000Z' }),
    ];

    expect(averageResponseTimeSeconds(ledger)).toBe(90);
    expect(averageResponseTimeSeconds(ledger.slice(0, 1))).toBeNull();
  });

  it('computes ledger metrics for an empty ledger', () => {
    const metrics = computeLedgerMetrics([]);

    expect(metrics.interactionCount).toBe(0);
    expect(metrics.progressPercentage).toBe(0);
    expect(metrics.averageMessageLength).toBe(0);
    expect(metrics.intensityTrend).toBe('insufficient_data');
    expect(metrics.progressIndicators).toEqual([]);
  });

  describe('session summary', () => {
    it('describes duration, emotions, assessment and letting-go use', () => {
      const metrics = computeSessionMetrics({
        interactions: [
          interaction('sadness', { techniqueUsed: 'letting_go' }),
          interaction('sadness', { techniqueUsed: 'letting_go' }),
          interaction('joy'),
        ],
        conditionClassifications: ['unclear', 'anxiety'],
        startTime: new Date('2024-03-01T10:00:00.000Z'),
        endTime: new Date('2024-03-01T10:30:00.000Z'),
      });

      expect(metrics.durationMinutes).toBe(30);
      expect(metrics.latestClassification).toBe('anxiety');
      expect(summarizeSession(metrics)).toBe(
        'Session lasted 30 minutes with 3 interactions. Dominant emotions: sadness, joy. ' +
        'Psychological assessment indicates anxiety. Letting-go technique used 2 times.'
      );
    });

    it('notes when no emotions were recorded', () => {
      const metrics = computeSessionMetrics({
        interactions: [],
        conditionClassifications: [],
        startTime: new Date('2024-03-01T10:00:00.000Z'),
        endTime: new Date('2024-03-01T10:00:00.000Z'),
      });

      expect(summarizeSession(metrics)).toBe('Session lasted 0 minutes with 0 interactions. No emotions were recorded.');
    });
  });
});
