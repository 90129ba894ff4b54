import { describe, it, expect, beforeEach } from 'vitest';
import { createJobProcessor } from './processor';
import type { InboundEvent, InboundJobData } from '../shared/types';
import { KeyedSerialExecutor } from '../shared/keyed-executor';
import { ConversationStateMachine } from '../domain/conversation/state-machine';
import { ConversationStateStore } from '../domain/conversation/state-store';
import { PatientService } from '../domain/patient/service';
import { SessionController } from '../domain/session/controller';
import { ReportCompiler } from '../domain/report/compiler';
import { createLocalization } from '../domain/localization/provider';
import {
  FakeLanguageService,
  InMemoryDocumentStore,
  RecordingGateway,
  silentLogger,
} from '../test-utils/fakes';

function job(id: string, event: InboundEvent): { id: string; data: InboundJobData } {
  return {
    id,
    data: {
      type: 'inbound_event',
      correlationId: `corr-${id}`,
      userId: 'user-1',
      event,
      receivedAt: '2024-03-01T10:00:00.000Z',
    },
  };
}

describe('createJobProcessor', () => {
  let store: InMemoryDocumentStore;
  let processJob: ReturnType<typeof createJobProcessor>;

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    const localization = createLocalization('en');
    const languageService = new FakeLanguageService();
    const patients = new PatientService(store, silentLogger);
    const sessions = new SessionController({ store, languageService, logger: silentLogger });
    const reports = new ReportCompiler({ store, patients, sessions, languageService, logger: silentLogger });
    const conversation = new ConversationStateMachine({
      states: new ConversationStateStore(store),
      patients,
      sessions,
      reports,
      languageService,
      localization,
      logger: silentLogger,
    });

    processJob = createJobProcessor({
      conversation,
      gateway: new RecordingGateway(),
      patients,
      localization,
      executor: new KeyedSerialExecutor(),
      logger: silentLogger,
    });
  });

  it('runs jobs of one user in arrival order', async () => {
    const [first, second] = await Promise.all([
      processJob(job('1', { kind: 'text', text: 'hello' })),
      processJob(job('2', { kind: 'choice', value: 'lang:en' })),
    ]);

    expect(first.state).toBe('LANGUAGE_SELECT');
    expect(second.state).toBe('REGISTER_NAME');
  });

  it('resolves with a failed result instead of throwing', async () => {
    store.failAllUpserts = true;

    await expect(processJob(job('1', { kind: 'text', text: 'hello' }))).resolves.toEqual({
      status: 'failed',
      correlationId: 'corr-1',
      error: 'connection terminated unexpectedly',
    });
  });
});
