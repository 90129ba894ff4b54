import { describe, it, expect, beforeEach } from 'vitest';
import { ReportCompiler, REPORTS_COLLECTION, sampleInteractions } from './compiler';
import { SessionController } from '../session/controller';
import { PatientService } from '../patient/service';
import { PatientNotFoundError } from '../../shared/errors';
import type { Intensity, Technique } from '../../shared/types';
import {
  FakeLanguageService,
  InMemoryDocumentStore,
  fixedClock,
  sequentialIds,
  silentLogger,
  steppingClock,
} from '../../test-utils/fakes';

type Turn = [emotionTag: string, technique: Technique, intensity?: Intensity];

const PROGRESS_JSON = `\`\`\`json
{
  "overall_assessment": "Steady improvement",
  "progress_indicators": ["More calm days"],
  "areas_of_concern": "Sleep",
  "recommendations": ["Keep journaling"],
  "treatment_stage": "improving"
}
\`\`\``;

describe('ReportCompiler', () => {
  let store: InMemoryDocumentStore;
  let languageService: FakeLanguageService;
  let patients: PatientService;
  let sessions: SessionController;
  let compiler: ReportCompiler;

  async function runSession(turns: Turn[], close: boolean = true) {
    const session = await sessions.openOrResume('patient-1');
    for (const [emotionTag, techniqueUsed, intensity] of turns) {
      await sessions.append(session, {
        userMessage: `feeling ${emotionTag}`,
        botResponse: 'I hear you',
        emotionTag,
        techniqueUsed,
        metadata: intensity ? { intensity } : {},
      });
    }
    if (close) await sessions.close(session);
    return session;
  }

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    languageService = new FakeLanguageService();
    patients = new PatientService(store, silentLogger, fixedClock('2024-02-01T00:00:00.000Z'));
    sessions = new SessionController({
      store,
      languageService,
      logger: silentLogger,
      clock: steppingClock('2024-03-01T10:00:00.000Z'),
      newId: sequentialIds('session'),
    });
    compiler = new ReportCompiler({
      store,
      patients,
      sessions,
      languageService,
      logger: silentLogger,
      clock: steppingClock('2024-03-05T12:00:00.000Z'),
      newId: sequentialIds('report'),
    });

    await patients.register({
      id: 'patient-1',
      name: 'Sam',
      condition: 'depression',
      language: 'en',
    });
  });

  it('rejects unknown patients', async () => {
    await expect(compiler.generateProgressReport('nobody')).rejects.toBeInstanceOf(PatientNotFoundError);
    await expect(compiler.generateAssessmentReport('nobody')).rejects.toBeInstanceOf(PatientNotFoundError);
  });

  it('uses the stock narrative without calling the service when there is no history', async () => {
    const report = await compiler.generateProgressReport('patient-1');

    expect(report.narrativeSource).toBe('fallback');
    expect(report.content.reportType).toBe('progress');
    expect(report.metrics.sessionCount).toBe(0);
    expect(report.metrics.firstSessionDate).toBeNull();
    expect(languageService.calls.synthesizeReport).toHaveLength(0);
    expect(store.get(REPORTS_COLLECTION, 'report-1')).toMatchObject({ reportId: 'report-1', patientId: 'patient-1' });
  });

  it('parses a generated progress narrative', async () => {
    await runSession([['sadness', 'letting_go'], ['anxiety', 'letting_go'], ['joy', 'standard']]);
    languageService.report = async () => PROGRESS_JSON;

    const report = await compiler.generateProgressReport('patient-1');

    expect(report.narrativeSource).toBe('generated');
    expect(report.content).toEqual({
      reportType: 'progress',
      overallAssessment: 'Steady improvement',
      progressIndicators: ['More calm days'],
      areasOfConcern: ['Sleep'],
      emotionalPatterns: '',
      interventionEffectiveness: '',
      recommendations: ['Keep journaling'],
      treatmentStage: 'improving',
    });
    expect(report.metrics).toMatchObject({
      sessionCount: 1,
      interactionCount: 3,
      progressPercentage: 20,
      firstSessionDate: '2024-03-01T10:00:00.000Z',
      lastSessionDate: '2024-03-01T10:00:00.000Z',
    });
    expect(report.metrics.techniqueEffectiveness.standard).toEqual({ improved: 1, total: 1, effectiveness: 100 });
    expect(report.creationDate).toBe('2024-03-05T12:00:00.000Z');

    const [request] = languageService.calls.synthesizeReport;
    expect(request?.reportType).toBe('progress');
    expect(request?.patient.name).toBe('Sam');
    expect(request?.interactions).toHaveLength(3);
  });

  it('falls back when the service fails', async () => {
    await runSession([['sadness', 'letting_go']]);
    languageService.report = async () => {
      throw new Error('overloaded');
    };

    const report = await compiler.generateProgressReport('patient-1');

    expect(report.narrativeSource).toBe('fallback');
    expect(report.content.reportType).toBe('progress');
    expect(report.metrics.progressPercentage).toBe(10);
  });

  it('falls back when the narrative cannot be parsed', async () => {
    await runSession([['sadness', 'letting_go']]);
    languageService.report = async () => 'I could not write a report today.';

    const report = await compiler.generateProgressReport('patient-1');

    expect(report.narrativeSource).toBe('fallback');
  });

  it('leaves the open session out of progress reports unless asked', async () => {
    await runSession([['calm', 'standard'], ['calm', 'standard'], ['joy', 'standard']]);
    await runSession([['fear', 'letting_go'], ['fear', 'letting_go']], false);

    const closedOnly = await compiler.generateProgressReport('patient-1');
    const withOpen = await compiler.generateProgressReport('patient-1', { includeOpen: true });

    expect(closedOnly.sessionIds).toEqual(['session-1']);
    expect(closedOnly.metrics.interactionCount).toBe(3);
    expect(withOpen.sessionIds).toEqual(['session-1', 'session-2']);
    expect(withOpen.metrics.interactionCount).toBe(5);
    expect(withOpen.metrics.progressPercentage).toBe(20);
  });

  it('reads the requested number of closed sessions besides the open one', async () => {
    await runSession([['calm', 'standard']]);
    await runSession([['calm', 'standard']]);
    await runSession([['joy', 'standard']], false);

    const report = await compiler.generateProgressReport('patient-1', { limit: 2, includeOpen: true });

    expect(report.sessionIds).toEqual(['session-1', 'session-2', 'session-3']);
  });

  it('does not pair interactions across sessions when rating techniques', async () => {
    await runSession([['sadness', 'standard']]);
    await runSession([['joy', 'standard']]);

    const report = await compiler.generateAssessmentReport('patient-1');

    expect(report.metrics.interactionCount).toBe(2);
    expect(report.metrics.techniqueEffectiveness.standard).toEqual({ improved: 0, total: 0, effectiveness: null });
  });

  it('builds assessments over every session with an intensity trend', async () => {
    await runSession([['fear', 'letting_go', 'high'], ['fear', 'letting_go', 'medium']]);
    await runSession([['calm', 'standard', 'low']], false);

    const report = await compiler.generateAssessmentReport('patient-1');

    expect(report.reportType).toBe('assessment');
    expect(report.content.reportType).toBe('assessment');
    expect(report.sessionIds).toEqual(['session-1', 'session-2']);
    expect(report.metrics.intensityTrend).toBe('decreasing_intensity');
  });

  it('samples long histories for assessments', async () => {
    await runSession(Array.from({ length: 35 }, (): Turn => ['calm', 'standard']));
    languageService.report = async () => '{}';

    await compiler.generateAssessmentReport('patient-1');

    expect(languageService.calls.synthesizeReport[0]?.interactions).toHaveLength(30);
  });

  it('still returns the report when it cannot be stored', async () => {
    await runSession([['joy', 'standard']]);
    store.failAllUpserts = true;

    const report = await compiler.generateProgressReport('patient-1');

    expect(report.reportId).toBe('report-1');
    expect(store.get(REPORTS_COLLECTION, 'report-1')).toBeUndefined();
  });

  it('lists stored reports newest first', async () => {
    await compiler.generateProgressReport('patient-1');
    await compiler.generateAssessmentReport('patient-1');

    const reports = await compiler.listReports('patient-1');

    expect(reports.map((r) => [r.reportId, r.reportType])).toEqual([
      ['report-2', 'assessment'],
      ['report-1', 'progress'],
    ]);
  });
});

describe('sampleInteractions', () => {
  const numbers = (n: number) => Array.from({ length: n }, (_, i) => i);

  it('returns short histories whole', () => {
    expect(sampleInteractions(numbers(30))).toEqual(numbers(30));
  });

  it('takes the earliest, middle and latest ten', () => {
    expect(sampleInteractions(numbers(40))).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9,
      15, 16, 17, 18, 19, 20, 21, 22, 23, 24,
      30, 31, 32, 33, 34, 35, 36, 37, 38, 39,
    ]);
  });
});
