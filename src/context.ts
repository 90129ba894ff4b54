import { config } from './config';
import { logger } from './infra/logging/logger';
import { queryMany } from './infra/db/client';
import { PgDocumentStore } from './infra/db/document-store';
import { AnthropicLanguageService } from './domain/ai/service';
import { createLocalization } from './domain/localization/provider';
import { PatientService } from './domain/patient/service';
import { SessionController } from './domain/session/controller';
import { ReportCompiler } from './domain/report/compiler';
import { ConversationStateStore } from './domain/conversation/state-store';
import { ConversationStateMachine } from './domain/conversation/state-machine';
import { GatewayClient } from './adapters/gateway/client';
import { KeyedSerialExecutor } from './shared/keyed-executor';
import type { LocalizationProvider, MessagingGateway } from './shared/types';

export interface AppContext {
  patients: PatientService;
  sessions: SessionController;
  reports: ReportCompiler;
  conversation: ConversationStateMachine;
  localization: LocalizationProvider;
  gateway: MessagingGateway;
  executor: KeyedSerialExecutor;
}

/**
 * Wires the production object graph. The API and the worker each build one
 * context; session state lives in the worker's.
 */
export function createContext(): AppContext {
  const store = new PgDocumentStore({ queryMany });

  const languageService = new AnthropicLanguageService({
    apiKey: config.anthropicApiKey,
    model: config.anthropicModel,
    fastModel: config.anthropicFastModel,
    rpmLimit: config.claudeRpmLimit,
    logger,
  });

  const localization = createLocalization(config.defaultLanguage);
  const patients = new PatientService(store, logger);

  const sessions = new SessionController({
    store,
    languageService,
    logger,
    languageServiceTimeoutMs: config.languageServiceTimeoutMs,
    reportBaseUrl: config.publicBaseUrl,
    policy: {
      checkpointEvery: config.checkpointEvery,
      classificationEvery: config.classificationEvery,
      classificationMinInteractions: config.classificationMinInteractions,
      classificationWindow: config.classificationWindow,
    },
  });

  const reports = new ReportCompiler({
    store,
    patients,
    sessions,
    languageService,
    logger,
    languageServiceTimeoutMs: config.languageServiceTimeoutMs,
  });

  const conversation = new ConversationStateMachine({
    states: new ConversationStateStore(store),
    patients,
    sessions,
    reports,
    languageService,
    localization,
    logger,
    policy: {
      lettingGoOfferEvery: config.lettingGoOfferEvery,
      languageServiceTimeoutMs: config.languageServiceTimeoutMs,
      defaultLanguage: config.defaultLanguage,
    },
  });

  const gateway = new GatewayClient({
    baseUrl: config.gatewayUrl,
    apiKey: config.gatewayApiKey,
    logger,
  });

  return {
    patients,
    sessions,
    reports,
    conversation,
    localization,
    gateway,
    executor: new KeyedSerialExecutor(),
  };
}
