import type { LocationResolver } from '../tools/location.js';
import { isErrorText } from '../tools/errors.js';
import { askYesNo } from './decision.js';
import type { LlmStageDeps } from './llm.js';
import { renderPrompt } from './prompts.js';

export interface AugmentResult {
  goal: string;
  /** Set only when a location was looked up and appended. */
  location?: string;
}

/**
 * Appends the caller's location to a goal that needs one and does not state one.
 *
 * Two classifications run in order. "Needs a location?" defaults to no on an
 * ambiguous or failed answer. "Already names a location?" is asked only after
 * a yes; an answer without "yes" means the location is missing and a failed
 * call counts as present. A failed lookup leaves the goal unchanged.
 */
export async function augmentGoal(
  goal: string,
  deps: LlmStageDeps & { location: LocationResolver },
): Promise<AugmentResult> {
  const { llm, log } = deps;

  const needsLocation = await askYesNo(
    llm,
    { name: 'location_needed', prompt: await renderPrompt('location_needed', { goal }), onError: false },
    log,
  );
  if (!needsLocation) return { goal };

  const hasLocation = await askYesNo(
    llm,
    { name: 'location_present', prompt: await renderPrompt('location_present', { goal }), onError: true },
    log,
  );
  if (hasLocation) return { goal };

  log.debug('Request needs a location and it is missing; resolving current location');
  const location = await deps.location.resolve();
  if (isErrorText(location)) {
    log.warn({ reason: location }, 'location_augmentation_skipped');
    return { goal };
  }
  const augmented = `${goal} in ${location}`;
  log.debug({ goal: augmented }, 'Updated goal with location');
  return { goal: augmented, location };
}
