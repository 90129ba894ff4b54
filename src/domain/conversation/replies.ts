import {
  LANGUAGES,
  PATIENT_CONDITIONS,
  type Choice,
  type Language,
  type LocalizationProvider,
  type Patient,
  type PatientCondition,
} from '../../shared/types';
import { emotionalTrend, ledgerProgress, progressIndicators, techniqueUsage } from '../analytics/engine';
import type { Report } from '../report/schema';
import type { Session } from '../session/session';

export const CHOICES = {
  language: (language: Language) => `lang:${language}`,
  condition: (condition: PatientCondition) => `condition:${condition}`,
  lettingGoYes: 'letting_go:yes',
  lettingGoNo: 'letting_go:no',
  viewProgress: 'menu:view_progress',
  sessionProgress: 'menu:session_progress',
  getReport: 'menu:get_report',
  continueConversation: 'menu:continue',
} as const;

const RECENT_SESSIONS_SHOWN = 5;
const PROGRESS_BAR_WIDTH = 10;

export function languageChoices(t: LocalizationProvider): Choice[] {
  return LANGUAGES.map((language) => ({
    label: t.getText(language, `language_${language}`),
    value: CHOICES.language(language),
  }));
}

export function conditionChoices(t: LocalizationProvider, language: Language): Choice[] {
  return PATIENT_CONDITIONS.map((condition) => ({
    label: t.getText(language, `condition_${condition}`),
    value: CHOICES.condition(condition),
  }));
}

export function menuChoices(t: LocalizationProvider, language: Language): Choice[] {
  return [
    { label: t.getText(language, 'view_progress'), value: CHOICES.viewProgress },
    { label: t.getText(language, 'session_progress'), value: CHOICES.sessionProgress },
    { label: t.getText(language, 'get_report'), value: CHOICES.getReport },
    { label: t.getText(language, 'continue_conversation'), value: CHOICES.continueConversation },
  ];
}

export function sessionProgressChoice(t: LocalizationProvider, language: Language): Choice[] {
  return [{ label: t.getText(language, 'session_progress'), value: CHOICES.sessionProgress }];
}

export function lettingGoChoices(t: LocalizationProvider, language: Language): Choice[] {
  return [
    { label: t.getText(language, 'letting_go_yes'), value: CHOICES.lettingGoYes },
    { label: t.getText(language, 'letting_go_no'), value: CHOICES.lettingGoNo },
  ];
}

export function progressBar(percentage: number, width: number = PROGRESS_BAR_WIDTH): string {
  const filled = Math.max(0, Math.min(width, Math.round((percentage / 100) * width)));
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function isoDate(date: Date | string): string {
  return (typeof date === 'string' ? date : date.toISOString()).slice(0, 10);
}

export function formatSessionProgress(t: LocalizationProvider, language: Language, session: Session): string {
  const percentage = ledgerProgress(session.interactions);
  const lines = [
    t.getText(language, 'session_progress_title'),
    t.getText(language, 'progress_bar', { bar: progressBar(percentage), percentage }),
    t.getText(language, 'letting_go_count', { count: techniqueUsage(session.interactions).letting_go }),
  ];

  const trend = emotionalTrend(session.interactions).slice(0, 3);
  if (trend.length === 0) {
    lines.push('', t.getText(language, 'no_data'));
  } else {
    lines.push('', t.getText(language, 'emotional_trends'));
    for (const entry of trend) {
      lines.push(t.getText(language, 'emotion_line', { emotion: entry.emotion, percentage: entry.percentage }));
    }
  }

  const indicators = progressIndicators(session.interactions);
  if (indicators.length > 0) {
    lines.push('', ...bulletList(indicators.map((indicator) => t.getText(language, `indicator_${indicator}`))));
  }

  return lines.join('\n');
}

/** Recap of the patient's last closed session, shown when they come back. */
export function formatPreviousSession(t: LocalizationProvider, language: Language, session: Session): string {
  return [
    t.getText(language, 'previous_session', { date: isoDate(session.startTime), count: session.length }),
    session.summary ?? t.getText(language, 'no_summary_available'),
  ].join('\n');
}

/** Overview across sessions; `sessions` is most recent first. */
export function formatProgressOverview(
  t: LocalizationProvider,
  language: Language,
  patient: Patient,
  sessions: readonly Session[]
): string {
  const totalInteractions = sessions.reduce((sum, s) => sum + s.length, 0);
  const lines = [
    t.getText(language, 'progress_overview_title'),
    t.getText(language, 'total_sessions', { count: sessions.length }),
    t.getText(language, 'total_interactions', { count: totalInteractions }),
    t.getText(language, 'using_since', { date: isoDate(patient.registrationDate) }),
  ];

  if (sessions.length > 0) {
    lines.push('', t.getText(language, 'recent_sessions'));
    for (const session of sessions.slice(0, RECENT_SESSIONS_SHOWN)) {
      const dominant = emotionalTrend(session.interactions)[0]?.emotion ?? t.getText(language, 'no_emotion');
      lines.push(t.getText(language, 'session_line', {
        date: isoDate(session.startTime),
        count: session.length,
        emotion: dominant,
      }));
    }
  }

  return lines.join('\n');
}

function bulletList(items: readonly string[]): string[] {
  return items.map((item) => `• ${item}`);
}

export function formatReport(t: LocalizationProvider, language: Language, report: Report): string {
  const content = report.content;
  const lines = [t.getText(language, 'therapeutic_report_title'), ''];

  if (content.reportType === 'progress') {
    lines.push(t.getText(language, 'overall_assessment'), content.overallAssessment, '');
    if (content.progressIndicators.length > 0) {
      lines.push(t.getText(language, 'progress_indicators'), ...bulletList(content.progressIndicators), '');
    }
    if (content.areasOfConcern.length > 0) {
      lines.push(t.getText(language, 'areas_of_concern'), ...bulletList(content.areasOfConcern), '');
    }
    if (content.recommendations.length > 0) {
      lines.push(t.getText(language, 'recommendations'), ...bulletList(content.recommendations), '');
    }
  } else {
    lines.push(t.getText(language, 'overall_assessment'), content.psychologicalEvaluation, '');
    if (content.treatmentRecommendations.length > 0) {
      lines.push(t.getText(language, 'recommendations'), ...bulletList(content.treatmentRecommendations), '');
    }
  }

  lines.push(t.getText(language, 'progress_bar', {
    bar: progressBar(report.metrics.progressPercentage),
    percentage: report.metrics.progressPercentage,
  }));
  lines.push(t.getText(language, 'treatment_stage', {
    stage: t.getText(language, `stage_${content.treatmentStage}`),
  }));

  return lines.join('\n');
}
