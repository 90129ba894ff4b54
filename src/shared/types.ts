// ============================================================================
// Enumerations
// ============================================================================

export const LANGUAGES = ['en', 'ar'] as const;
export type Language = (typeof LANGUAGES)[number];

export const PATIENT_CONDITIONS = ['depression', 'bipolar', 'ocd', 'unknown'] as const;
export type PatientCondition = (typeof PATIENT_CONDITIONS)[number];

export const CONDITION_CLASSIFICATIONS = [
  'depression',
  'anxiety',
  'bipolar',
  'ocd',
  'adjustment_disorder',
  'ptsd',
  'general_stress',
  'unclear',
] as const;
export type ConditionClassification = (typeof CONDITION_CLASSIFICATIONS)[number];

export const TECHNIQUES = ['standard', 'letting_go'] as const;
export type Technique = (typeof TECHNIQUES)[number];

export const INTENSITIES = ['low', 'medium', 'high'] as const;
export type Intensity = (typeof INTENSITIES)[number];

export const REPORT_TYPES = ['progress', 'assessment'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((l) => l === value);
}

export function isConditionClassification(value: string): value is ConditionClassification {
  return CONDITION_CLASSIFICATIONS.some((c) => c === value);
}

// ============================================================================
// Patient & Interaction
// ============================================================================

export interface Patient {
  id: string;
  name: string;
  nationality?: string;
  age?: number | string;
  education?: string;
  condition: PatientCondition;
  language: Language;
  registrationDate: string;
}

export interface InteractionMetadata {
  language?: Language;
  intensity?: Intensity | null;
  detectedLanguage?: Language | null;
  [key: string]: unknown;
}

export interface Interaction {
  readonly timestamp: string;
  readonly userMessage: string;
  readonly botResponse: string;
  readonly emotionTag: string | null;
  readonly techniqueUsed: Technique;
  readonly metadata: InteractionMetadata;
}

// ============================================================================
// Messaging
// ============================================================================

export type Command = 'start' | 'end' | 'help';

export type InboundEvent =
  | { kind: 'text'; text: string }
  | { kind: 'choice'; value: string }
  | { kind: 'command'; command: Command };

export interface Choice {
  label: string;
  value: string;
}

export interface OutboundReply {
  text: string;
  choices?: Choice[];
}

export interface MessagingGateway {
  send(userId: string, reply: OutboundReply): Promise<void>;
}

// ============================================================================
// Language Understanding
// ============================================================================

export interface EmotionAnalysis {
  emotionTag: string;
  intensity: Intensity | null;
  detectedLanguage: Language | null;
}

export interface ReplyRequest {
  text: string;
  emotionTag: string | null;
  condition: PatientCondition;
  language: Language;
  techniqueHint: Technique;
  patientName?: string;
  history?: ReadonlyArray<Pick<Interaction, 'userMessage' | 'botResponse'>>;
}

export interface LanguageUnderstandingService {
  analyzeEmotion(text: string): Promise<EmotionAnalysis>;
  generateReply(request: ReplyRequest): Promise<string>;
  /** Raw label text; callers normalize it to a ConditionClassification. */
  classifyCondition(recentInteractions: readonly Interaction[]): Promise<string>;
  /** Raw JSON narrative text; callers parse it for the requested report type. */
  synthesizeReport(request: ReportSynthesisRequest): Promise<string>;
}

export interface ReportSynthesisRequest {
  reportType: ReportType;
  language: Language;
  patient: Pick<Patient, 'name' | 'condition' | 'age' | 'nationality' | 'education'>;
  interactions: readonly Interaction[];
  metrics: object;
}

// ============================================================================
// Persistence
// ============================================================================

export type DocumentFilter = Record<string, string | number | boolean | null>;

export interface FindManyOptions {
  sort?: { field: string; direction: 'asc' | 'desc' };
  limit?: number;
}

export interface DocumentStore {
  upsert(collection: string, key: string, document: object): Promise<void>;
  findOne(collection: string, filter: DocumentFilter): Promise<unknown | null>;
  findMany(collection: string, filter: DocumentFilter, options?: FindManyOptions): Promise<unknown[]>;
}

// ============================================================================
// Localization
// ============================================================================

export type TextParams = Record<string, string | number>;

export interface LocalizationProvider {
  getText(language: Language, key: string, params?: TextParams): string;
}

// ============================================================================
// Job Types
// ============================================================================

export interface InboundJobData {
  type: 'inbound_event';
  correlationId: string;
  userId: string;
  event: InboundEvent;
  displayName?: string;
  receivedAt: string;
}

export interface QueueStats {
  waiting: number;
  active: number;
  failed: number;
  paused: boolean;
}

export interface JobResult {
  status: 'completed' | 'failed' | 'skipped';
  correlationId: string;
  action?: string;
  state?: string;
  error?: string;
}

export type Clock = () => Date;
