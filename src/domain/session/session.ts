import { z } from 'zod';
import {
  CONDITION_CLASSIFICATIONS,
  INTENSITIES,
  LANGUAGES,
  TECHNIQUES,
  type ConditionClassification,
  type Interaction,
} from '../../shared/types';
import { InvalidStateError } from '../../shared/errors';
import { err, ok, ParseError, type Result } from '../../shared/result';
import { sessionMetricsSchema, type SessionMetrics } from '../analytics/schema';

export const interactionSchema = z.object({
  timestamp: z.string(),
  userMessage: z.string(),
  botResponse: z.string(),
  emotionTag: z.string().nullable(),
  techniqueUsed: z.enum(TECHNIQUES),
  metadata: z.object({
    language: z.enum(LANGUAGES).optional(),
    intensity: z.enum(INTENSITIES).nullable().optional(),
    detectedLanguage: z.enum(LANGUAGES).nullable().optional(),
  }).passthrough(),
});

export const sessionSnapshotSchema = z.object({
  sessionId: z.string(),
  patientId: z.string(),
  startTime: z.string(),
  endTime: z.string().nullable(),
  interactions: z.array(interactionSchema),
  conditionClassifications: z.array(z.enum(CONDITION_CLASSIFICATIONS)),
  summary: z.string().nullable(),
  metrics: sessionMetricsSchema.nullable(),
});

export type SessionSnapshot = z.infer<typeof sessionSnapshotSchema>;

/**
 * One therapeutic conversation. The ledger only grows, and only while the
 * session is open. Summary and metrics are written once, by close().
 */
export class Session {
  private readonly ledger: Interaction[];
  private readonly classifications: ConditionClassification[];
  private closedAt: Date | null;
  private closingSummary: string | null;
  private closingMetrics: SessionMetrics | null;

  private constructor(
    readonly sessionId: string,
    readonly patientId: string,
    readonly startTime: Date,
    state: {
      interactions: Interaction[];
      classifications: ConditionClassification[];
      endTime: Date | null;
      summary: string | null;
      metrics: SessionMetrics | null;
    }
  ) {
    this.ledger = state.interactions;
    this.classifications = state.classifications;
    this.closedAt = state.endTime;
    this.closingSummary = state.summary;
    this.closingMetrics = state.metrics;
  }

  static start(sessionId: string, patientId: string, startTime: Date): Session {
    return new Session(sessionId, patientId, startTime, {
      interactions: [],
      classifications: [],
      endTime: null,
      summary: null,
      metrics: null,
    });
  }

  static fromDocument(document: unknown): Result<Session, ParseError> {
    const parsed = sessionSnapshotSchema.safeParse(document);
    if (!parsed.success) {
      return err(new ParseError(parsed.error.message, JSON.stringify(document)));
    }

    const snapshot = parsed.data;
    return ok(new Session(snapshot.sessionId, snapshot.patientId, new Date(snapshot.startTime), {
      interactions: snapshot.interactions.map((i) => Object.freeze({ ...i, metadata: { ...i.metadata } })),
      classifications: [...snapshot.conditionClassifications],
      endTime: snapshot.endTime === null ? null : new Date(snapshot.endTime),
      summary: snapshot.summary,
      metrics: snapshot.metrics,
    }));
  }

  get isOpen(): boolean {
    return this.closedAt === null;
  }

  get endTime(): Date | null {
    return this.closedAt;
  }

  get interactions(): readonly Interaction[] {
    return this.ledger;
  }

  get length(): number {
    return this.ledger.length;
  }

  get conditionClassifications(): readonly ConditionClassification[] {
    return this.classifications;
  }

  get summary(): string | null {
    return this.closingSummary;
  }

  get metrics(): SessionMetrics | null {
    return this.closingMetrics;
  }

  append(interaction: Interaction): void {
    this.assertOpen('append to');
    this.ledger.push(Object.freeze({ ...interaction, metadata: { ...interaction.metadata } }));
  }

  addClassification(classification: ConditionClassification): void {
    this.assertOpen('classify');
    this.classifications.push(classification);
  }

  close(endTime: Date, summary: string, metrics: SessionMetrics): void {
    this.assertOpen('close');
    this.closedAt = endTime;
    this.closingSummary = summary;
    this.closingMetrics = metrics;
  }

  toSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      patientId: this.patientId,
      startTime: this.startTime.toISOString(),
      endTime: this.closedAt ? this.closedAt.toISOString() : null,
      interactions: this.ledger.map((i) => ({ ...i, metadata: { ...i.metadata } })),
      conditionClassifications: [...this.classifications],
      summary: this.closingSummary,
      metrics: this.closingMetrics,
    };
  }

  private assertOpen(action: string): void {
    if (!this.isOpen) {
      throw new InvalidStateError(`Cannot ${action} closed session ${this.sessionId}`);
    }
  }
}
