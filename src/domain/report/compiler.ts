import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
  Clock,
  ConditionClassification,
  DocumentStore,
  Interaction,
  LanguageUnderstandingService,
  Patient,
  ReportType,
} from '../../shared/types';
import { toError } from '../../shared/errors';
import { computeLedgerMetrics, intensityTrend, techniqueEffectivenessAcross } from '../analytics/engine';
import { callWithFallback, stockNarrative } from '../ai/fallbacks';
import { parseNarrative } from '../ai/parsing';
import type { PatientService } from '../patient/service';
import type { SessionController } from '../session/controller';
import type { Session } from '../session/session';
import { reportSchema, type Report, type ReportMetrics, type ReportNarrative } from './schema';

export const REPORTS_COLLECTION = 'reports';

export const DEFAULT_PROGRESS_SESSIONS = 10;
export const PROGRESS_PROMPT_INTERACTIONS = 20;
export const ASSESSMENT_SAMPLE_THRESHOLD = 30;
export const ASSESSMENT_SAMPLE_SIZE = 10;

export interface ReportCompilerDeps {
  store: DocumentStore;
  patients: PatientService;
  sessions: SessionController;
  languageService: LanguageUnderstandingService;
  logger: Logger;
  clock?: Clock;
  newId?: () => string;
  languageServiceTimeoutMs?: number;
}

export interface ProgressReportOptions {
  limit?: number;
  /** Include the patient's open session alongside the closed ones. */
  includeOpen?: boolean;
}

/**
 * Interactions from every session, oldest first. The sort is stable, so
 * entries sharing a timestamp keep their ledger order.
 */
export function chronologicalInteractions(sessions: readonly Session[]): Interaction[] {
  return sessions
    .flatMap((session) => session.interactions)
    .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/**
 * Earliest, middle and latest slices of a long ledger. Short ledgers are
 * returned whole.
 */
export function sampleInteractions<T>(
  interactions: readonly T[],
  size: number = ASSESSMENT_SAMPLE_SIZE,
  threshold: number = ASSESSMENT_SAMPLE_THRESHOLD
): T[] {
  if (interactions.length <= threshold) {
    return [...interactions];
  }

  const middleStart = Math.floor(interactions.length / 2) - Math.floor(size / 2);
  return [
    ...interactions.slice(0, size),
    ...interactions.slice(middleStart, middleStart + size),
    ...interactions.slice(-size),
  ];
}

export class ReportCompiler {
  private readonly store: DocumentStore;
  private readonly patients: PatientService;
  private readonly sessions: SessionController;
  private readonly languageService: LanguageUnderstandingService;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: () => string;
  private readonly timeoutMs: number;

  constructor(deps: ReportCompilerDeps) {
    this.store = deps.store;
    this.patients = deps.patients;
    this.sessions = deps.sessions;
    this.languageService = deps.languageService;
    this.logger = deps.logger.child({ component: 'report-compiler' });
    this.clock = deps.clock ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.timeoutMs = deps.languageServiceTimeoutMs ?? 15000;
  }

  async generateProgressReport(patientId: string, options: ProgressReportOptions = {}): Promise<Report> {
    const { limit = DEFAULT_PROGRESS_SESSIONS, includeOpen = false } = options;
    const patient = await this.patients.getById(patientId);

    const recent = await this.sessions.listForPatient(patientId, { limit, includeOpen });
    const sessions = [...recent].reverse();
    const interactions = chronologicalInteractions(sessions);

    const metrics = this.buildMetrics(sessions, interactions);

    return this.compile('progress', patient, sessions, metrics, interactions.slice(-PROGRESS_PROMPT_INTERACTIONS));
  }

  async generateAssessmentReport(patientId: string): Promise<Report> {
    const patient = await this.patients.getById(patientId);

    const sessions = await this.sessions.listForPatient(patientId, { includeOpen: true });
    sessions.reverse();
    const interactions = chronologicalInteractions(sessions);

    const metrics: ReportMetrics = {
      ...this.buildMetrics(sessions, interactions),
      intensityTrend: intensityTrend(interactions),
    };

    return this.compile('assessment', patient, sessions, metrics, sampleInteractions(interactions));
  }

  async listReports(patientId: string, limit: number = 20): Promise<Report[]> {
    const documents = await this.store.findMany(
      REPORTS_COLLECTION,
      { patientId },
      { sort: { field: 'creationDate', direction: 'desc' }, limit }
    );

    const reports: Report[] = [];
    for (const document of documents) {
      const parsed = reportSchema.safeParse(document);
      if (parsed.success) {
        reports.push(parsed.data);
      } else {
        this.logger.warn({ patientId, error: parsed.error.message }, 'Skipping invalid stored report');
      }
    }
    return reports;
  }

  private buildMetrics(sessions: readonly Session[], interactions: readonly Interaction[]): ReportMetrics {
    const ledger = computeLedgerMetrics(interactions);
    const classifications: ConditionClassification[] = sessions.flatMap((s) => [...s.conditionClassifications]);

    const first = sessions[0];
    const last = sessions[sessions.length - 1];

    return {
      sessionCount: sessions.length,
      interactionCount: ledger.interactionCount,
      firstSessionDate: first ? first.startTime.toISOString() : null,
      lastSessionDate: last ? last.startTime.toISOString() : null,
      emotionalTrend: ledger.emotionalTrend,
      techniqueUsage: ledger.techniqueUsage,
      techniqueEffectiveness: techniqueEffectivenessAcross(sessions.map((s) => s.interactions)),
      progressPercentage: ledger.progressPercentage,
      engagementTrend: ledger.engagementTrend,
      emotionalValence: ledger.emotionalValence,
      progressIndicators: ledger.progressIndicators,
      conditionClassifications: classifications,
      latestClassification: classifications.at(-1) ?? null,
    };
  }

  private async compile(
    reportType: ReportType,
    patient: Patient,
    sessions: readonly Session[],
    metrics: ReportMetrics,
    promptInteractions: readonly Interaction[]
  ): Promise<Report> {
    const { narrative, source } = await this.narrate(reportType, patient, metrics, promptInteractions);

    const report: Report = {
      reportId: this.newId(),
      patientId: patient.id,
      creationDate: this.clock().toISOString(),
      reportType,
      content: narrative,
      narrativeSource: source,
      metrics,
      sessionIds: sessions.map((s) => s.sessionId),
    };

    try {
      await this.store.upsert(REPORTS_COLLECTION, report.reportId, report);
    } catch (error) {
      this.logger.warn({
        reportId: report.reportId,
        patientId: patient.id,
        error: toError(error).message,
      }, 'Failed to persist report');
    }

    this.logger.info({
      reportId: report.reportId,
      patientId: patient.id,
      reportType,
      sessions: sessions.length,
      narrativeSource: source,
    }, 'Report generated');

    return report;
  }

  private async narrate(
    reportType: ReportType,
    patient: Patient,
    metrics: ReportMetrics,
    interactions: readonly Interaction[]
  ): Promise<{ narrative: ReportNarrative; source: 'generated' | 'fallback' }> {
    if (interactions.length === 0) {
      return { narrative: stockNarrative(reportType), source: 'fallback' };
    }

    const raw = await callWithFallback<string | null>(
      `synthesize_${reportType}_report`,
      () => this.languageService.synthesizeReport({
        reportType,
        language: patient.language,
        patient: {
          name: patient.name,
          condition: patient.condition,
          age: patient.age,
          nationality: patient.nationality,
          education: patient.education,
        },
        interactions,
        metrics,
      }),
      () => null,
      { timeoutMs: this.timeoutMs, logger: this.logger }
    );

    if (raw === null) {
      return { narrative: stockNarrative(reportType), source: 'fallback' };
    }

    const parsed = parseNarrative(reportType, raw);
    if (!parsed.ok) {
      this.logger.warn({ reportType, error: parsed.error.message }, 'Unparsable report narrative');
      return { narrative: stockNarrative(reportType), source: 'fallback' };
    }

    return { narrative: parsed.value, source: 'generated' };
  }
}
