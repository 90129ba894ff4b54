import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
  Clock,
  ConditionClassification,
  DocumentStore,
  Interaction,
  InteractionMetadata,
  LanguageUnderstandingService,
  Technique,
} from '../../shared/types';
import {
  ConflictError,
  InvalidStateError,
  PersistenceError,
  SessionNotFoundError,
  toError,
} from '../../shared/errors';
import { unwrapOr } from '../../shared/result';
import { computeSessionMetrics, summarizeSession } from '../analytics/engine';
import type { SessionMetrics } from '../analytics/schema';
import { callWithFallback } from '../ai/fallbacks';
import { parseClassification } from '../ai/parsing';
import { Session } from './session';

export const SESSIONS_COLLECTION = 'sessions';

export interface SessionPolicy {
  checkpointEvery: number;
  classificationEvery: number;
  classificationMinInteractions: number;
  classificationWindow: number;
}

export const DEFAULT_SESSION_POLICY: SessionPolicy = {
  checkpointEvery: 5,
  classificationEvery: 5,
  classificationMinInteractions: 3,
  classificationWindow: 5,
};

export interface SessionControllerDeps {
  store: DocumentStore;
  languageService: LanguageUnderstandingService;
  logger: Logger;
  clock?: Clock;
  newId?: () => string;
  policy?: Partial<SessionPolicy>;
  languageServiceTimeoutMs?: number;
  /** Prefix for session report links, e.g. the public API origin. */
  reportBaseUrl?: string;
}

export interface AppendInput {
  userMessage: string;
  botResponse: string;
  emotionTag: string | null;
  techniqueUsed: Technique;
  metadata?: InteractionMetadata;
}

export interface SessionReportRef {
  sessionId: string;
  patientId: string;
  href: string;
}

export interface SessionReport {
  sessionId: string;
  patientId: string;
  startTime: string;
  endTime: string | null;
  status: 'open' | 'closed';
  summary: string | null;
  conditionClassifications: ConditionClassification[];
  metrics: SessionMetrics;
}

/**
 * Owns the open session of each patient. Appends go to the in-memory
 * aggregate; the store sees full snapshots at checkpoint boundaries and at
 * close.
 */
export class SessionController {
  private readonly store: DocumentStore;
  private readonly languageService: LanguageUnderstandingService;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly newId: () => string;
  private readonly timeoutMs: number;
  private readonly reportBaseUrl: string;
  readonly policy: SessionPolicy;

  private readonly active = new Map<string, Session>();
  private readonly unflushed = new Map<string, Session>();

  constructor(deps: SessionControllerDeps) {
    this.store = deps.store;
    this.languageService = deps.languageService;
    this.logger = deps.logger.child({ component: 'session-controller' });
    this.clock = deps.clock ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.timeoutMs = deps.languageServiceTimeoutMs ?? 15000;
    this.reportBaseUrl = (deps.reportBaseUrl ?? '').replace(/\/+$/, '');
    this.policy = { ...DEFAULT_SESSION_POLICY, ...deps.policy };
  }

  async open(patientId: string): Promise<Session> {
    const existing = await this.getOpen(patientId);
    if (existing) {
      throw new ConflictError(
        `Patient ${patientId} already has open session ${existing.sessionId}`,
        existing.sessionId
      );
    }

    const session = Session.start(this.newId(), patientId, this.clock());
    this.active.set(patientId, session);

    this.logger.info({ patientId, sessionId: session.sessionId }, 'Session opened');
    return session;
  }

  /** Open a session, or continue the one already open for the patient. */
  async openOrResume(patientId: string): Promise<Session> {
    try {
      return await this.open(patientId);
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;

      const existing = await this.getOpen(patientId);
      if (!existing) throw error;

      this.active.set(patientId, existing);
      this.logger.info({ patientId, sessionId: existing.sessionId }, 'Resuming open session');
      return existing;
    }
  }

  /**
   * Only sessions this controller opened or resumed are held in memory. Any
   * other open session is read from the store on every call, so a reader
   * never keeps a copy the owning process has since closed.
   */
  async getOpen(patientId: string): Promise<Session | null> {
    const cached = this.active.get(patientId);
    if (cached?.isOpen) {
      return cached;
    }

    const document = await this.store.findOne(SESSIONS_COLLECTION, { patientId, endTime: null });
    if (!document) {
      return null;
    }

    const session = this.rehydrate(document);

    // The store can lag behind a close whose final flush failed
    const pending = this.unflushed.get(session.sessionId);
    if (pending && !pending.isOpen) {
      await this.flush(pending, 'close-retry');
      return null;
    }

    return session;
  }

  async append(session: Session, input: AppendInput): Promise<Session> {
    if (!session.isOpen) {
      throw new InvalidStateError(`Cannot append to closed session ${session.sessionId}`);
    }

    const interaction: Interaction = {
      timestamp: this.clock().toISOString(),
      userMessage: input.userMessage,
      botResponse: input.botResponse,
      emotionTag: input.emotionTag,
      techniqueUsed: input.techniqueUsed,
      metadata: {
        ...input.metadata,
        sessionId: session.sessionId,
        patientId: session.patientId,
      },
    };
    session.append(interaction);

    if (this.isClassificationDue(session)) {
      await this.classify(session);
    }

    await this.maybeCheckpoint(session);
    return session;
  }

  isClassificationDue(session: Session): boolean {
    const count = session.length;
    return count >= this.policy.classificationMinInteractions
      && count % this.policy.classificationEvery === 0;
  }

  /**
   * Writes a snapshot on every checkpoint boundary. Returns whether a write
   * succeeded; failures stay pending until the next boundary or close.
   */
  async maybeCheckpoint(session: Session): Promise<boolean> {
    const count = session.length;
    if (count === 0 || count % this.policy.checkpointEvery !== 0) {
      return false;
    }
    return this.flush(session, 'checkpoint');
  }

  async close(session: Session): Promise<SessionReportRef> {
    if (!session.isOpen) {
      if (this.unflushed.has(session.sessionId)) {
        await this.flush(session, 'close-retry');
      }
      return this.referenceFor(session);
    }

    const endTime = this.clock();
    const metrics = computeSessionMetrics({
      interactions: session.interactions,
      conditionClassifications: session.conditionClassifications,
      startTime: session.startTime,
      endTime,
    });
    session.close(endTime, summarizeSession(metrics), metrics);

    if (this.active.get(session.patientId) === session) {
      this.active.delete(session.patientId);
    }

    await this.flush(session, 'close');

    this.logger.info({
      patientId: session.patientId,
      sessionId: session.sessionId,
      interactions: session.length,
    }, 'Session closed');

    return this.referenceFor(session);
  }

  /** Close the patient's open session, if there is one. */
  async closeOpen(patientId: string): Promise<SessionReportRef | null> {
    const session = await this.getOpen(patientId);
    return session ? this.close(session) : null;
  }

  /** Close every session held in memory. Returns how many were closed. */
  async closeAll(): Promise<number> {
    const open = [...this.active.values()].filter((session) => session.isOpen);
    for (const session of open) {
      await this.close(session);
    }
    for (const session of [...this.unflushed.values()]) {
      await this.flush(session, 'shutdown');
    }
    return open.length;
  }

  referenceFor(session: Session): SessionReportRef {
    return {
      sessionId: session.sessionId,
      patientId: session.patientId,
      href: `${this.reportBaseUrl}/api/sessions/${encodeURIComponent(session.sessionId)}/report`,
    };
  }

  get pendingFlushes(): number {
    return this.unflushed.size;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async findById(sessionId: string): Promise<Session | null> {
    for (const session of this.active.values()) {
      if (session.sessionId === sessionId) return session;
    }

    const pending = this.unflushed.get(sessionId);
    if (pending) return pending;

    const document = await this.store.findOne(SESSIONS_COLLECTION, { sessionId });
    return document ? this.rehydrate(document) : null;
  }

  /**
   * Most recent sessions first. `limit` counts closed sessions; the open one
   * comes on top of them and is taken from memory when held here, since it
   * may not have reached a checkpoint yet.
   */
  async listForPatient(
    patientId: string,
    options: { limit?: number; includeOpen?: boolean } = {}
  ): Promise<Session[]> {
    const { limit, includeOpen = false } = options;

    const documents = await this.store.findMany(
      SESSIONS_COLLECTION,
      { patientId },
      { sort: { field: 'startTime', direction: 'desc' }, limit: limit === undefined ? undefined : limit + 1 }
    );

    const closed = documents
      .map((document) => this.rehydrate(document))
      .filter((session) => !session.isOpen);

    const sessions = limit === undefined ? closed : closed.slice(0, limit);
    if (includeOpen) {
      const open = await this.getOpen(patientId);
      if (open && !sessions.some((s) => s.sessionId === open.sessionId)) {
        sessions.push(open);
      }
    }

    return sessions.sort((a, b) => b.startTime.getTime() - a.startTime.getTime());
  }

  async buildSessionReport(sessionId: string): Promise<SessionReport> {
    const session = await this.findById(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const metrics = session.metrics ?? computeSessionMetrics({
      interactions: session.interactions,
      conditionClassifications: session.conditionClassifications,
      startTime: session.startTime,
      endTime: this.clock(),
    });

    return {
      sessionId: session.sessionId,
      patientId: session.patientId,
      startTime: session.startTime.toISOString(),
      endTime: session.endTime ? session.endTime.toISOString() : null,
      status: session.isOpen ? 'open' : 'closed',
      summary: session.summary,
      conditionClassifications: [...session.conditionClassifications],
      metrics,
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async classify(session: Session): Promise<void> {
    const window = session.interactions.slice(-this.policy.classificationWindow);

    const raw = await callWithFallback(
      'classify_condition',
      () => this.languageService.classifyCondition(window),
      () => 'unclear',
      { timeoutMs: this.timeoutMs, logger: this.logger }
    );

    const classification = unwrapOr(parseClassification(raw), (parseError) => {
      this.logger.warn({ sessionId: session.sessionId, error: parseError.message }, 'Unparsable classification');
      return 'unclear' as const;
    });

    session.addClassification(classification);
    this.logger.info({
      sessionId: session.sessionId,
      interactions: session.length,
      classification,
    }, 'Condition classified');
  }

  private async flush(session: Session, reason: string): Promise<boolean> {
    const retry = this.unflushed.has(session.sessionId);

    try {
      await this.store.upsert(SESSIONS_COLLECTION, session.sessionId, session.toSnapshot());
      this.unflushed.delete(session.sessionId);

      this.logger.debug({
        sessionId: session.sessionId,
        reason,
        retry,
        interactions: session.length,
      }, 'Session flushed');
      return true;
    } catch (error) {
      this.unflushed.set(session.sessionId, session);
      const failure = new PersistenceError(`${reason} of session ${session.sessionId} failed`, toError(error));

      this.logger.warn({
        sessionId: session.sessionId,
        reason,
        retry,
        error: failure.message,
        cause: failure.originalError?.message,
      }, 'Session flush failed, will retry');
      return false;
    }
  }

  private rehydrate(document: unknown): Session {
    const result = Session.fromDocument(document);
    if (!result.ok) {
      throw new PersistenceError(`Stored session is invalid: ${result.error.message}`);
    }
    return result.value;
  }
}
