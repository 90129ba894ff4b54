import type { Logger } from 'pino';
import { LanguageServiceError, toError } from '../../shared/errors';
import { withTimeout } from '../../shared/timeout';
import type { AssessmentNarrative, ProgressNarrative, ReportNarrative } from '../report/schema';
import type { ReportType } from '../../shared/types';

export interface FallbackOptions {
  timeoutMs: number;
  logger: Logger;
}

/**
 * Run a language-service call under a timeout. Any failure is logged as a
 * LanguageServiceError and replaced by the fallback value.
 */
export async function callWithFallback<T>(
  operation: string,
  fn: () => Promise<T>,
  fallback: (error: LanguageServiceError) => T,
  options: FallbackOptions
): Promise<T> {
  try {
    return await withTimeout(fn(), options.timeoutMs, operation);
  } catch (error) {
    const cause = toError(error);
    const serviceError = error instanceof LanguageServiceError
      ? error
      : new LanguageServiceError(`${operation} failed: ${cause.message}`, cause);

    options.logger.warn({
      operation,
      error: serviceError.message,
    }, 'Language service call failed, using fallback');

    return fallback(serviceError);
  }
}

// ============================================================================
// Stock narratives
// ============================================================================

export function stockProgressNarrative(): ProgressNarrative {
  return {
    reportType: 'progress',
    overallAssessment: 'A narrative assessment is not available for this report. The metrics below were computed from the recorded sessions.',
    progressIndicators: ['Continued participation in sessions'],
    areasOfConcern: ['Narrative analysis unavailable; review the recorded metrics directly'],
    emotionalPatterns: 'See the emotional trend metrics.',
    interventionEffectiveness: 'See the technique effectiveness metrics.',
    recommendations: [
      'Continue regular sessions',
      'Practise the letting-go technique when difficult emotions arise',
    ],
    treatmentStage: 'early_stage',
  };
}

export function stockAssessmentNarrative(): AssessmentNarrative {
  return {
    reportType: 'assessment',
    psychologicalEvaluation: 'A narrative evaluation is not available for this report. The metrics below were computed from the full session history.',
    symptomProgression: 'See the emotional trend and intensity metrics.',
    corePatterns: [],
    riskFactors: [],
    protectiveFactors: ['Continued engagement with sessions'],
    treatmentResponse: 'See the technique effectiveness metrics.',
    prognosis: 'Not assessed.',
    treatmentRecommendations: ['Review the recorded metrics with a qualified professional'],
    effectiveInterventions: [],
    conditionSeverity: 'moderate',
    treatmentStage: 'early_stage',
  };
}

export function stockNarrative(reportType: ReportType): ReportNarrative {
  return reportType === 'progress' ? stockProgressNarrative() : stockAssessmentNarrative();
}
