import { DEFAULT_CONFLICT_SETTINGS, type ConflictSettings } from '@/lib/config';
import type { ConflictRepositories } from '@/lib/repositories/types';
import { ConflictDetectionService } from './aggregator';
import { createAutoResolutionPolicy, type AutoResolutionPolicy } from './policy';
import { ConflictPriorityService } from './priority';
import { ConflictResolutionService } from './resolver';
import { ConflictSuggestionService, type SuggestionAdvisor } from './suggestions';

export { ConflictDetectionService } from './aggregator';
export { CONFLICT_CHECKS, runAllChecks, type ScheduleSnapshot } from './detector';
export { canAutoApply, createAutoResolutionPolicy, type AutoResolutionPolicy } from './policy';
export {
  ConflictPriorityService,
  estimateCascadeImpact,
  getHistoricalSuccessRate,
  type RankedConflict,
} from './priority';
export { ConflictResolutionService, type BatchOptions } from './resolver';
export { ConflictSuggestionService, type SuggestionAdvisor } from './suggestions';

export interface ConflictEngineOptions {
  settings?: ConflictSettings;
  advisor?: SuggestionAdvisor | null;
  now?: () => Date;
}

export interface ConflictEngine {
  settings: ConflictSettings;
  policy: AutoResolutionPolicy;
  detection: ConflictDetectionService;
  suggestions: ConflictSuggestionService;
  priority: ConflictPriorityService;
  resolution: ConflictResolutionService;
}

/**
 * Wire the engine services over one set of stores
 */
export function createConflictEngine(
  repositories: ConflictRepositories,
  options: ConflictEngineOptions = {}
): ConflictEngine {
  const settings = options.settings ?? DEFAULT_CONFLICT_SETTINGS;
  const policy = createAutoResolutionPolicy(settings);
  const detection = new ConflictDetectionService(repositories, settings);
  const suggestions = new ConflictSuggestionService(repositories, settings, options.advisor ?? null);

  return {
    settings,
    policy,
    detection,
    suggestions,
    priority: new ConflictPriorityService(repositories.conflicts, options.now),
    resolution: new ConflictResolutionService(repositories, detection, suggestions, policy),
  };
}
