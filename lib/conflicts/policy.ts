import type { ConflictSettings } from '@/lib/config';
import type { ResolutionSuggestion, ResolutionType } from '@/types';

export interface AutoResolutionPolicy {
  confidenceThreshold: number;
  // Resolution types that always need a person to sign off
  blockedTypes: readonly ResolutionType[];
}

export const MANUAL_ONLY_RESOLUTIONS: readonly ResolutionType[] = ['SPLIT_SECTION', 'REMOVE_SLOT', 'MANUAL_REVIEW'];

export function createAutoResolutionPolicy(settings: Pick<ConflictSettings, 'autoApplyConfidenceThreshold'>): AutoResolutionPolicy {
  return {
    confidenceThreshold: settings.autoApplyConfidenceThreshold,
    blockedTypes: MANUAL_ONLY_RESOLUTIONS,
  };
}

/**
 * A suggestion may be applied without a person only when it does not ask for
 * confirmation, its type is not manual-only and its confidence reaches the
 * threshold.
 */
export function canAutoApply(
  suggestion: ResolutionSuggestion | null | undefined,
  policy: AutoResolutionPolicy
): boolean {
  if (!suggestion) return false;
  if (suggestion.requiresConfirmation) return false;
  if (policy.blockedTypes.includes(suggestion.type)) return false;
  return suggestion.confidence >= policy.confidenceThreshold;
}
