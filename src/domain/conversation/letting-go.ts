import type { Language, LocalizationProvider, Technique } from '../../shared/types';
import { isNegativeEmotion } from '../analytics/engine';

export const LETTING_GO_STEPS = ['letting_go_step1', 'letting_go_step2', 'letting_go_step3', 'letting_go_step4'] as const;

export function selectTechnique(emotionTag: string | null): Technique {
  return isNegativeEmotion(emotionTag) ? 'letting_go' : 'standard';
}

/**
 * The exercise is offered after a letting-go reply, on every `every`-th
 * interaction of the session, unless it was offered before and not declined.
 */
export function shouldOfferLettingGo(input: {
  technique: Technique;
  interactionCount: number;
  offerPending: boolean;
  every: number;
}): boolean {
  return input.technique === 'letting_go'
    && !input.offerPending
    && input.interactionCount > 0
    && input.interactionCount % input.every === 0;
}

export function lettingGoExercise(localization: LocalizationProvider, language: Language): string {
  return [
    localization.getText(language, 'letting_go_intro'),
    ...LETTING_GO_STEPS.map((key) => localization.getText(language, key)),
  ].join('\n\n');
}
