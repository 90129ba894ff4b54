import { describe, it, expect } from 'vitest';
import { extractJson, parseClassification, parseEmotion, parseNarrative } from './parsing';

describe('extractJson', () => {
  it('reads fenced JSON', () => {
    const result = extractJson('Here you go:\n```json\n{"a": 1}\n```');
    expect(result).toEqual({ ok: true, value: { a: 1 } });
  });

  it('reads an object surrounded by prose', () => {
    const result = extractJson('Sure! {"emotion": "joy"} Hope that helps.');
    expect(result).toEqual({ ok: true, value: { emotion: 'joy' } });
  });

  it('returns a parse error carrying the raw text', () => {
    const result = extractJson('no json here');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.raw).toBe('no json here');
    expect(result.error.message).toMatch(/^Invalid JSON/);
  });
});

describe('parseEmotion', () => {
  it('normalizes tag, intensity and language', () => {
    const result = parseEmotion('{"emotion": " Sadness ", "intensity": "HIGH", "language": "ar"}');

    expect(result).toEqual({
      ok: true,
      value: { emotionTag: 'sadness', intensity: 'high', detectedLanguage: 'ar' },
    });
  });

  it('drops unknown intensity and language values', () => {
    const result = parseEmotion('{"emotion": "joy", "intensity": "extreme", "language": "fr"}');

    expect(result).toEqual({
      ok: true,
      value: { emotionTag: 'joy', intensity: null, detectedLanguage: null },
    });
  });

  it('rejects a response without an emotion', () => {
    expect(parseEmotion('{"intensity": "low"}').ok).toBe(false);
    expect(parseEmotion('{"emotion": ""}').ok).toBe(false);
  });
});

describe('parseClassification', () => {
  it('accepts bare and loosely written labels', () => {
    expect(parseClassification('ptsd')).toEqual({ ok: true, value: 'ptsd' });
    expect(parseClassification('General stress.')).toEqual({ ok: true, value: 'general_stress' });
    expect(parseClassification('Adjustment-Disorder')).toEqual({ ok: true, value: 'adjustment_disorder' });
  });

  it('accepts a JSON object with a condition field', () => {
    expect(parseClassification('{"condition": "Anxiety"}')).toEqual({ ok: true, value: 'anxiety' });
  });

  it('rejects unknown labels', () => {
    const result = parseClassification('burnout');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Unknown condition label: burnout');
  });
});

describe('parseNarrative', () => {
  it('fills progress defaults and wraps single strings in lists', () => {
    const result = parseNarrative('progress', JSON.stringify({
      overall_assessment: 'Doing better',
      recommendations: 'Rest well',
      treatment_stage: 'unheard_of',
    }));

    expect(result).toEqual({
      ok: true,
      value: {
        reportType: 'progress',
        overallAssessment: 'Doing better',
        progressIndicators: [],
        areasOfConcern: [],
        emotionalPatterns: '',
        interventionEffectiveness: '',
        recommendations: ['Rest well'],
        treatmentStage: 'early_stage',
      },
    });
  });

  it('maps assessment fields', () => {
    const result = parseNarrative('assessment', JSON.stringify({
      psychological_evaluation: 'Stable mood',
      core_patterns: ['Rumination'],
      condition_severity: 'mild',
      treatment_stage: 'stable',
    }));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      reportType: 'assessment',
      psychologicalEvaluation: 'Stable mood',
      corePatterns: ['Rumination'],
      riskFactors: [],
      conditionSeverity: 'mild',
      treatmentStage: 'stable',
    });
  });

  it('rejects a narrative without its main field', () => {
    expect(parseNarrative('progress', '{"recommendations": []}').ok).toBe(false);
    expect(parseNarrative('assessment', '{}').ok).toBe(false);
  });
});
