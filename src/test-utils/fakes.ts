import pino from 'pino';
import type {
  Clock,
  DocumentFilter,
  DocumentStore,
  EmotionAnalysis,
  FindManyOptions,
  Interaction,
  LanguageUnderstandingService,
  MessagingGateway,
  OutboundReply,
  ReplyRequest,
  ReportSynthesisRequest,
} from '../shared/types';

export const silentLogger = pino({ level: 'silent' });

/** Documents are stored as JSON text and parsed on every read. */
export class InMemoryDocumentStore implements DocumentStore {
  private collections = new Map<string, Map<string, string>>();

  upserts: Array<{ collection: string; key: string }> = [];
  failUpserts = 0;
  failAllUpserts = false;

  async upsert(collection: string, key: string, document: object): Promise<void> {
    if (this.failAllUpserts || this.failUpserts > 0) {
      this.failUpserts = Math.max(0, this.failUpserts - 1);
      throw new Error('connection terminated unexpectedly');
    }

    let docs = this.collections.get(collection);
    if (!docs) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    docs.set(key, JSON.stringify(document));
    this.upserts.push({ collection, key });
  }

  async findOne(collection: string, filter: DocumentFilter): Promise<unknown | null> {
    const [first] = await this.findMany(collection, filter, { limit: 1 });
    return first ?? null;
  }

  async findMany(collection: string, filter: DocumentFilter, options: FindManyOptions = {}): Promise<unknown[]> {
    const docs = [...(this.collections.get(collection)?.values() ?? [])]
      .map((text): Record<string, unknown> => JSON.parse(text))
      .filter((doc) => Object.entries(filter).every(([field, value]) => doc[field] === value));

    const { sort, limit } = options;
    if (sort) {
      const sign = sort.direction === 'asc' ? 1 : -1;
      docs.sort((a, b) => sign * String(a[sort.field]).localeCompare(String(b[sort.field])));
    }

    return limit === undefined ? docs : docs.slice(0, limit);
  }

  get(collection: string, key: string): unknown {
    const text = this.collections.get(collection)?.get(key);
    return text === undefined ? undefined : JSON.parse(text);
  }

  upsertsTo(collection: string): number {
    return this.upserts.filter((u) => u.collection === collection).length;
  }
}

type Handler<A extends unknown[], R> = (...args: A) => Promise<R>;

/**
 * Scripted language service. Each operation resolves through a replaceable
 * handler and every call is recorded.
 */
export class FakeLanguageService implements LanguageUnderstandingService {
  emotion: Handler<[string], EmotionAnalysis> = async () => ({
    emotionTag: 'calm',
    intensity: 'low',
    detectedLanguage: 'en',
  });
  reply: Handler<[ReplyRequest], string> = async (request) => `reply to: ${request.text}`;
  classification: Handler<[readonly Interaction[]], string> = async () => 'unclear';
  report: Handler<[ReportSynthesisRequest], string> = async () => {
    throw new Error('no report scripted');
  };

  calls: {
    analyzeEmotion: string[];
    generateReply: ReplyRequest[];
    classifyCondition: Array<readonly Interaction[]>;
    synthesizeReport: ReportSynthesisRequest[];
  } = { analyzeEmotion: [], generateReply: [], classifyCondition: [], synthesizeReport: [] };

  async analyzeEmotion(text: string): Promise<EmotionAnalysis> {
    this.calls.analyzeEmotion.push(text);
    return this.emotion(text);
  }

  async generateReply(request: ReplyRequest): Promise<string> {
    this.calls.generateReply.push(request);
    return this.reply(request);
  }

  async classifyCondition(recentInteractions: readonly Interaction[]): Promise<string> {
    this.calls.classifyCondition.push(recentInteractions);
    return this.classification(recentInteractions);
  }

  async synthesizeReport(request: ReportSynthesisRequest): Promise<string> {
    this.calls.synthesizeReport.push(request);
    return this.report(request);
  }

  /** Emotions returned in order for successive analyzeEmotion calls; the last one repeats. */
  scriptEmotions(tags: ReadonlyArray<string | null>): void {
    let index = 0;
    this.emotion = async () => {
      const tag = tags[Math.min(index, tags.length - 1)] ?? null;
      index++;
      return { emotionTag: tag ?? 'unknown', intensity: 'medium', detectedLanguage: 'en' };
    };
  }
}

export class RecordingGateway implements MessagingGateway {
  sent: Array<{ userId: string; reply: OutboundReply }> = [];
  failNext = 0;

  async send(userId: string, reply: OutboundReply): Promise<void> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('gateway unavailable');
    }
    this.sent.push({ userId, reply });
  }

  textsFor(userId: string): string[] {
    return this.sent.filter((s) => s.userId === userId).map((s) => s.reply.text);
  }
}

/** Advances by `stepMs` on every read, starting at `start`. */
export function steppingClock(start: string, stepMs: number = 60_000): Clock {
  let current = new Date(start).getTime() - stepMs;
  return () => {
    current += stepMs;
    return new Date(current);
  };
}

export function fixedClock(at: string): Clock {
  return () => new Date(at);
}

export function sequentialIds(prefix: string = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function interaction(
  emotionTag: string | null,
  overrides: Partial<Interaction> = {}
): Interaction {
  return {
    timestamp: '2024-03-01T10:00:00.000Z',
    userMessage: 'hello there',
    botResponse: 'hi, how are you feeling?',
    emotionTag,
    techniqueUsed: 'standard',
    metadata: {},
    ...overrides,
  };
}
