import { z } from 'zod';
import { LANGUAGES, type Clock, type DocumentStore } from '../../shared/types';
import { PersistenceError } from '../../shared/errors';

export const CONVERSATION_STATES_COLLECTION = 'conversation_states';

export const CONVERSATION_STATES = [
  'LANGUAGE_SELECT',
  'REGISTER_NAME',
  'REGISTER_NATIONALITY',
  'REGISTER_AGE',
  'REGISTER_EDUCATION',
  'SELECT_CONDITION',
  'CONVERSATION',
  'LETTING_GO_PROMPT',
  'END',
] as const;
export type ConversationStateName = (typeof CONVERSATION_STATES)[number];

const registrationDraftSchema = z.object({
  language: z.enum(LANGUAGES).optional(),
  name: z.string().optional(),
  nationality: z.string().optional(),
  age: z.union([z.number().int(), z.string()]).optional(),
  education: z.string().optional(),
});
export type RegistrationDraft = z.infer<typeof registrationDraftSchema>;

const conversationStateSchema = z.object({
  userId: z.string(),
  state: z.enum(CONVERSATION_STATES),
  draft: registrationDraftSchema,
  lettingGoOffered: z.boolean(),
  updatedAt: z.string(),
});
export type ConversationState = z.infer<typeof conversationStateSchema>;

export class ConversationStateStore {
  constructor(
    private store: DocumentStore,
    private clock: Clock = () => new Date()
  ) {}

  async get(userId: string): Promise<ConversationState | null> {
    const document = await this.store.findOne(CONVERSATION_STATES_COLLECTION, { userId });
    if (!document) {
      return null;
    }

    const parsed = conversationStateSchema.safeParse(document);
    if (!parsed.success) {
      throw new PersistenceError(`Stored conversation state for ${userId} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async save(state: Omit<ConversationState, 'updatedAt'>): Promise<ConversationState> {
    const saved: ConversationState = { ...state, updatedAt: this.clock().toISOString() };
    await this.store.upsert(CONVERSATION_STATES_COLLECTION, state.userId, saved);
    return saved;
  }
}
