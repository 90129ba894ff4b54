import { describe, it, expect, beforeEach } from 'vitest';
import { handleInboundEvent } from './inbound';
import type { InboundEvent, InboundJobData } from '../../shared/types';
import { ConversationStateMachine } from '../../domain/conversation/state-machine';
import { ConversationStateStore } from '../../domain/conversation/state-store';
import { PatientService } from '../../domain/patient/service';
import { SessionController } from '../../domain/session/controller';
import { ReportCompiler } from '../../domain/report/compiler';
import { createLocalization } from '../../domain/localization/provider';
import {
  FakeLanguageService,
  InMemoryDocumentStore,
  RecordingGateway,
  silentLogger,
} from '../../test-utils/fakes';

function job(event: InboundEvent): InboundJobData {
  return {
    type: 'inbound_event',
    correlationId: 'corr-1',
    userId: 'user-1',
    event,
    receivedAt: '2024-03-01T10:00:00.000Z',
  };
}

describe('handleInboundEvent', () => {
  const localization = createLocalization('en');

  let store: InMemoryDocumentStore;
  let gateway: RecordingGateway;
  let deps: Parameters<typeof handleInboundEvent>[1];

  beforeEach(() => {
    store = new InMemoryDocumentStore();
    gateway = new RecordingGateway();

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

    deps = { conversation, gateway, patients, localization };
  });

  it('delivers the replies of a transition', async () => {
    const result = await handleInboundEvent(job({ kind: 'text', text: 'hello' }), deps, silentLogger);

    expect(result).toEqual({
      status: 'completed',
      correlationId: 'corr-1',
      action: 'text',
      state: 'LANGUAGE_SELECT',
    });
    expect(gateway.textsFor('user-1')).toEqual([localization.getText('en', 'language_prompt')]);
  });

  it('sends one fallback in the language of the message when the transition fails', async () => {
    store.failAllUpserts = true;

    const result = await handleInboundEvent(job({ kind: 'text', text: 'مرحبا' }), deps, silentLogger);

    expect(result).toEqual({
      status: 'failed',
      correlationId: 'corr-1',
      error: 'connection terminated unexpectedly',
    });
    expect(gateway.textsFor('user-1')).toEqual([localization.getText('ar', 'error_processing')]);
  });

  it('sends the fallback when delivery of the first reply fails', async () => {
    gateway.failNext = 1;

    const result = await handleInboundEvent(job({ kind: 'command', command: 'help' }), deps, silentLogger);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('gateway unavailable');
    expect(gateway.textsFor('user-1')).toEqual([localization.getText('en', 'error_processing')]);
  });

  it('gives up quietly when the fallback cannot be delivered either', async () => {
    gateway.failNext = 2;

    const result = await handleInboundEvent(job({ kind: 'text', text: 'hello' }), deps, silentLogger);

    expect(result.status).toBe('failed');
    expect(gateway.sent).toHaveLength(0);
  });
});
