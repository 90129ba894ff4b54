import type { Logger } from 'pino';
import {
  LANGUAGES,
  PATIENT_CONDITIONS,
  isLanguage,
  type Command,
  type InboundEvent,
  type Language,
  type LanguageUnderstandingService,
  type LocalizationProvider,
  type OutboundReply,
  type Patient,
  type PatientCondition,
} from '../../shared/types';
import { toError } from '../../shared/errors';
import { TimeoutError } from '../../shared/timeout';
import { isValidMessage, isValidName, parseAge, sanitizeInput } from '../../shared/validation';
import { callWithFallback } from '../ai/fallbacks';
import { unknownEmotion } from '../ai/parsing';
import type { PatientService } from '../patient/service';
import type { ReportCompiler } from '../report/compiler';
import type { SessionController } from '../session/controller';
import { lettingGoExercise, selectTechnique, shouldOfferLettingGo } from './letting-go';
import {
  CHOICES,
  conditionChoices,
  formatPreviousSession,
  formatProgressOverview,
  formatReport,
  formatSessionProgress,
  languageChoices,
  lettingGoChoices,
  menuChoices,
  sessionProgressChoice,
} from './replies';
import type { ConversationState, ConversationStateName, ConversationStateStore } from './state-store';

export interface ConversationPolicy {
  lettingGoOfferEvery: number;
  languageServiceTimeoutMs: number;
  defaultLanguage: Language;
  historyWindow: number;
  overviewSessions: number;
}

export const DEFAULT_CONVERSATION_POLICY: ConversationPolicy = {
  lettingGoOfferEvery: 3,
  languageServiceTimeoutMs: 15000,
  defaultLanguage: 'en',
  historyWindow: 5,
  overviewSessions: 5,
};

export interface ConversationDeps {
  states: ConversationStateStore;
  patients: PatientService;
  sessions: SessionController;
  reports: ReportCompiler;
  languageService: LanguageUnderstandingService;
  localization: LocalizationProvider;
  logger: Logger;
  policy?: Partial<ConversationPolicy>;
}

export interface TransitionResult {
  state: ConversationStateName;
  replies: OutboundReply[];
}

export interface HandleOptions {
  logger?: Logger;
  displayName?: string;
}

type WorkingState = Omit<ConversationState, 'updatedAt'>;

interface Outcome {
  next: WorkingState;
  replies: OutboundReply[];
}

interface Turn {
  userId: string;
  current: WorkingState;
  log: Logger;
  displayName?: string;
}

/**
 * Per-user conversation automaton. Each call loads the user's state, applies
 * one inbound event and persists the next state. Replies are returned to the
 * caller for delivery.
 */
export class ConversationStateMachine {
  private readonly deps: ConversationDeps;
  private readonly policy: ConversationPolicy;

  constructor(deps: ConversationDeps) {
    this.deps = deps;
    this.policy = { ...DEFAULT_CONVERSATION_POLICY, ...deps.policy };
  }

  async handle(userId: string, event: InboundEvent, options: HandleOptions = {}): Promise<TransitionResult> {
    const log = (options.logger ?? this.deps.logger).child({ userId });
    const stored = await this.deps.states.get(userId);

    const turn: Turn = {
      userId,
      current: stored ?? { userId, state: 'END', draft: {}, lettingGoOffered: false },
      log,
      displayName: options.displayName,
    };

    let outcome: Outcome;
    if (event.kind === 'command') {
      outcome = await this.onCommand(turn, event.command);
    } else if (turn.current.state === 'END') {
      outcome = await this.enter(turn);
    } else {
      outcome = await this.dispatch(turn, event);
    }

    await this.deps.states.save(outcome.next);

    log.info({
      from: stored?.state ?? null,
      to: outcome.next.state,
      event: event.kind,
      replies: outcome.replies.length,
    }, 'Conversation transition');

    return { state: outcome.next.state, replies: outcome.replies };
  }

  // ==========================================================================
  // Commands & entry
  // ==========================================================================

  private async onCommand(turn: Turn, command: Command): Promise<Outcome> {
    switch (command) {
      case 'start':
        return this.enter(turn);

      case 'help': {
        const help: OutboundReply = { text: this.text(await this.languageFor(turn), 'help_text') };
        if (turn.current.state === 'END') {
          const entry = await this.enter(turn);
          return { next: entry.next, replies: [help, ...entry.replies] };
        }
        return { next: turn.current, replies: [help] };
      }

      case 'end':
        return this.end(turn);
    }
  }

  private async enter(turn: Turn): Promise<Outcome> {
    const patient = await this.deps.patients.findById(turn.userId);

    if (!patient) {
      return {
        next: this.reset(turn, 'LANGUAGE_SELECT'),
        replies: [this.languagePrompt()],
      };
    }

    const previous = await this.deps.sessions.closeOpen(patient.id);
    if (previous) {
      turn.log.info({ sessionId: previous.sessionId }, 'Closed previous session on restart');
    }

    const [last] = await this.deps.sessions.listForPatient(patient.id, { limit: 1 });
    await this.deps.sessions.openOrResume(patient.id);

    const replies: OutboundReply[] = [];
    if (last) {
      replies.push({ text: formatPreviousSession(this.deps.localization, patient.language, last) });
    }
    replies.push({
      text: this.text(patient.language, 'welcome_back', { name: patient.name }),
      choices: [...menuChoices(this.deps.localization, patient.language), ...languageChoices(this.deps.localization)],
    });

    return { next: this.reset(turn, 'CONVERSATION'), replies };
  }

  private async end(turn: Turn): Promise<Outcome> {
    const language = await this.languageFor(turn);
    const ref = await this.deps.sessions.closeOpen(turn.userId);

    if (ref) {
      turn.log.info({ sessionId: ref.sessionId, report: ref.href }, 'Session flushed on end command');
    }

    return {
      next: this.reset(turn, 'END'),
      replies: [{ text: this.text(language, 'end_conversation') }],
    };
  }

  // ==========================================================================
  // State dispatch
  // ==========================================================================

  private async dispatch(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Promise<Outcome> {
    switch (turn.current.state) {
      case 'LANGUAGE_SELECT':
        return this.onLanguageSelect(turn, event);
      case 'REGISTER_NAME':
        return this.onName(turn, event);
      case 'REGISTER_NATIONALITY':
        return this.onNationality(turn, event);
      case 'REGISTER_AGE':
        return this.onAge(turn, event);
      case 'REGISTER_EDUCATION':
        return this.onEducation(turn, event);
      case 'SELECT_CONDITION':
        return this.onCondition(turn, event);
      case 'CONVERSATION':
      case 'LETTING_GO_PROMPT':
        return this.onConversation(turn, event);
      case 'END':
        return this.enter(turn);
    }
  }

  private onLanguageSelect(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Outcome {
    const language = this.resolveLanguage(event);
    if (!language) {
      return this.stay(turn, [this.languagePrompt()]);
    }

    return {
      next: { ...turn.current, state: 'REGISTER_NAME', draft: { ...turn.current.draft, language } },
      replies: [{ text: this.text(language, 'ask_name') }],
    };
  }

  private onName(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Outcome {
    const language = this.draftLanguage(turn);
    const name = event.kind === 'text' ? sanitizeInput(event.text, 100) : '';

    if (!isValidName(name)) {
      return this.stay(turn, [{ text: this.text(language, 'invalid_name') }]);
    }

    return {
      next: { ...turn.current, state: 'REGISTER_NATIONALITY', draft: { ...turn.current.draft, name } },
      replies: [{ text: this.text(language, 'ask_nationality', { name }) }],
    };
  }

  private onNationality(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Outcome {
    const language = this.draftLanguage(turn);
    const nationality = event.kind === 'text' ? sanitizeInput(event.text, 100) : '';

    if (!isValidMessage(nationality)) {
      return this.stay(turn, [{ text: this.text(language, 'ask_nationality', { name: turn.current.draft.name ?? '' }) }]);
    }

    return {
      next: { ...turn.current, state: 'REGISTER_AGE', draft: { ...turn.current.draft, nationality } },
      replies: [{ text: this.text(language, 'ask_age') }],
    };
  }

  private onAge(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Outcome {
    const language = this.draftLanguage(turn);
    if (event.kind !== 'text') {
      return this.stay(turn, [{ text: this.text(language, 'ask_age') }]);
    }

    const raw = sanitizeInput(event.text, 100);
    const parsed = parseAge(raw);
    if (parsed === null) {
      turn.log.warn({ field: 'age', value: raw }, 'Age is not an integer, storing raw answer');
    }

    return {
      next: { ...turn.current, state: 'REGISTER_EDUCATION', draft: { ...turn.current.draft, age: parsed ?? raw } },
      replies: [{ text: this.text(language, 'ask_education') }],
    };
  }

  private onEducation(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Outcome {
    const language = this.draftLanguage(turn);
    const education = event.kind === 'text' ? sanitizeInput(event.text, 200) : '';

    if (!isValidMessage(education)) {
      return this.stay(turn, [{ text: this.text(language, 'ask_education') }]);
    }

    return {
      next: { ...turn.current, state: 'SELECT_CONDITION', draft: { ...turn.current.draft, education } },
      replies: [this.conditionPrompt(language, 'ask_condition')],
    };
  }

  private async onCondition(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Promise<Outcome> {
    const language = this.draftLanguage(turn);
    const condition = this.resolveCondition(event, language);

    if (!condition) {
      return this.stay(turn, [this.conditionPrompt(language, 'invalid_choice')]);
    }

    const { draft } = turn.current;
    const patient = await this.deps.patients.register({
      id: turn.userId,
      name: draft.name ?? turn.displayName ?? turn.userId,
      nationality: draft.nationality,
      age: draft.age,
      education: draft.education,
      condition,
      language,
    });

    await this.deps.sessions.openOrResume(patient.id);

    return {
      next: this.reset(turn, 'CONVERSATION'),
      replies: [{
        text: this.text(language, 'registration_complete', { name: patient.name }),
        choices: menuChoices(this.deps.localization, language),
      }],
    };
  }

  private async onConversation(turn: Turn, event: Exclude<InboundEvent, { kind: 'command' }>): Promise<Outcome> {
    const patient = await this.deps.patients.findById(turn.userId);
    if (!patient) {
      turn.log.warn('Conversation state without a patient record, restarting registration');
      return this.enter(turn);
    }

    if (turn.current.state === 'LETTING_GO_PROMPT') {
      return this.onLettingGoAnswer(turn, patient, event);
    }

    return this.onConversationEvent(turn, patient, event);
  }

  private async onConversationEvent(
    turn: Turn,
    patient: Patient,
    event: Exclude<InboundEvent, { kind: 'command' }>
  ): Promise<Outcome> {
    if (event.kind === 'text') {
      return this.exchange(turn, patient, event.text);
    }

    const language = this.resolveLanguage(event);
    if (language) {
      const updated = await this.deps.patients.updateLanguage(patient.id, language);
      return this.stay(turn, [{
        text: this.text(language, 'welcome_back', { name: updated.name }),
        choices: menuChoices(this.deps.localization, language),
      }]);
    }

    switch (event.value) {
      case CHOICES.viewProgress: {
        const sessions = await this.deps.sessions.listForPatient(patient.id, {
          limit: this.policy.overviewSessions,
          includeOpen: true,
        });
        return this.stay(turn, [{
          text: formatProgressOverview(this.deps.localization, patient.language, patient, sessions),
          choices: menuChoices(this.deps.localization, patient.language),
        }]);
      }

      case CHOICES.sessionProgress: {
        const session = await this.deps.sessions.openOrResume(patient.id);
        return this.stay(turn, [{
          text: formatSessionProgress(this.deps.localization, patient.language, session),
        }]);
      }

      case CHOICES.getReport:
        return this.stay(turn, [
          { text: this.text(patient.language, 'generating_report') },
          await this.progressReport(turn, patient),
        ]);

      case CHOICES.continueConversation:
        return this.stay(turn, [{ text: this.text(patient.language, 'how_feeling_today') }]);

      default:
        return this.stay(turn, [{
          text: this.text(patient.language, 'invalid_input'),
          choices: menuChoices(this.deps.localization, patient.language),
        }]);
    }
  }

  private async onLettingGoAnswer(
    turn: Turn,
    patient: Patient,
    event: Exclude<InboundEvent, { kind: 'command' }>
  ): Promise<Outcome> {
    // Only declining clears the offer flag
    const answered: Turn = { ...turn, current: { ...turn.current, state: 'CONVERSATION' } };

    if (event.kind === 'choice' && event.value === CHOICES.lettingGoYes) {
      return this.stay(answered, [{
        text: lettingGoExercise(this.deps.localization, patient.language),
        choices: sessionProgressChoice(this.deps.localization, patient.language),
      }]);
    }

    if (event.kind === 'choice' && event.value === CHOICES.lettingGoNo) {
      return {
        next: { ...answered.current, lettingGoOffered: false },
        replies: [{ text: this.text(patient.language, 'how_feeling_today') }],
      };
    }

    return this.onConversationEvent(answered, patient, event);
  }

  // ==========================================================================
  // Conversational exchange
  // ==========================================================================

  private async exchange(turn: Turn, patient: Patient, text: string): Promise<Outcome> {
    const language = patient.language;
    const message = sanitizeInput(text, 4000);

    if (!isValidMessage(message)) {
      return this.stay(turn, [{ text: this.text(language, 'invalid_input') }]);
    }

    const session = await this.deps.sessions.openOrResume(patient.id);
    const fallbackOptions = { timeoutMs: this.policy.languageServiceTimeoutMs, logger: turn.log };

    const analysis = await callWithFallback(
      'analyze_emotion',
      () => this.deps.languageService.analyzeEmotion(message),
      () => unknownEmotion(),
      fallbackOptions
    );
    const technique = selectTechnique(analysis.emotionTag);

    const reply = await callWithFallback(
      'generate_reply',
      () => this.deps.languageService.generateReply({
        text: message,
        emotionTag: analysis.emotionTag,
        condition: patient.condition,
        language,
        techniqueHint: technique,
        patientName: patient.name,
        history: session.interactions.slice(-this.policy.historyWindow),
      }),
      (error) => this.text(language, error.originalError instanceof TimeoutError ? 'timeout_error' : 'error_processing'),
      fallbackOptions
    );

    await this.deps.sessions.append(session, {
      userMessage: message,
      botResponse: reply,
      emotionTag: analysis.emotionTag,
      techniqueUsed: technique,
      metadata: {
        language,
        intensity: analysis.intensity,
        detectedLanguage: analysis.detectedLanguage,
      },
    });

    const replies: OutboundReply[] = [{
      text: reply,
      choices: sessionProgressChoice(this.deps.localization, language),
    }];

    const offer = shouldOfferLettingGo({
      technique,
      interactionCount: session.length,
      offerPending: turn.current.lettingGoOffered,
      every: this.policy.lettingGoOfferEvery,
    });

    if (!offer) {
      return this.stay(turn, replies);
    }

    replies.push({
      text: this.text(language, 'letting_go_prompt'),
      choices: lettingGoChoices(this.deps.localization, language),
    });

    return {
      next: { ...turn.current, state: 'LETTING_GO_PROMPT', lettingGoOffered: true },
      replies,
    };
  }

  private async progressReport(turn: Turn, patient: Patient): Promise<OutboundReply> {
    try {
      const report = await this.deps.reports.generateProgressReport(patient.id, { includeOpen: true });
      return {
        text: formatReport(this.deps.localization, patient.language, report),
        choices: menuChoices(this.deps.localization, patient.language),
      };
    } catch (error) {
      turn.log.error({ error: toError(error).message }, 'Progress report failed');
      return { text: this.text(patient.language, 'report_error') };
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private text(language: Language, key: string, params?: Record<string, string | number>): string {
    return this.deps.localization.getText(language, key, params);
  }

  private stay(turn: Turn, replies: OutboundReply[]): Outcome {
    return { next: turn.current, replies };
  }

  private reset(turn: Turn, state: ConversationStateName): WorkingState {
    return { userId: turn.userId, state, draft: {}, lettingGoOffered: false };
  }

  private draftLanguage(turn: Turn): Language {
    return turn.current.draft.language ?? this.policy.defaultLanguage;
  }

  private async languageFor(turn: Turn): Promise<Language> {
    if (turn.current.draft.language) {
      return turn.current.draft.language;
    }
    const patient = await this.deps.patients.findById(turn.userId);
    return patient?.language ?? this.policy.defaultLanguage;
  }

  private languagePrompt(): OutboundReply {
    return {
      text: this.text(this.policy.defaultLanguage, 'language_prompt'),
      choices: languageChoices(this.deps.localization),
    };
  }

  private conditionPrompt(language: Language, key: string): OutboundReply {
    return {
      text: this.text(language, key),
      choices: conditionChoices(this.deps.localization, language),
    };
  }

  private resolveLanguage(event: Exclude<InboundEvent, { kind: 'command' }>): Language | null {
    if (event.kind === 'choice') {
      const [prefix, code] = event.value.split(':');
      return prefix === 'lang' && code !== undefined && isLanguage(code) ? code : null;
    }

    const answer = event.text.trim().toLowerCase();
    return LANGUAGES.find((language) =>
      language === answer || this.text(language, `language_${language}`).toLowerCase() === answer
    ) ?? null;
  }

  private resolveCondition(
    event: Exclude<InboundEvent, { kind: 'command' }>,
    language: Language
  ): PatientCondition | null {
    if (event.kind === 'choice') {
      return PATIENT_CONDITIONS.find((c) => CHOICES.condition(c) === event.value) ?? null;
    }

    const answer = event.text.trim().toLowerCase();
    return PATIENT_CONDITIONS.find((condition) =>
      condition === answer || this.text(language, `condition_${condition}`).toLowerCase() === answer
    ) ?? null;
  }
}
