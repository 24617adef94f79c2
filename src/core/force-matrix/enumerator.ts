/**
 * Scenario Enumerator
 * 프로필 × 니드 카테고리 × forced × preprep 순서 고정 곱집합
 */

import { NEED_CATEGORIES } from './types';
import type { Profile, Scenario } from './types';

const FLAGS: readonly boolean[] = [false, true];

export function* enumerateScenarios(profiles: readonly Profile[]): Generator<Scenario> {
  for (const profile of profiles) {
    for (const category of NEED_CATEGORIES) {
      for (const forced of FLAGS) {
        for (const preprep of FLAGS) {
          yield { profile, category, forced, preprep };
        }
      }
    }
  }
}

/**
 * 프로필당 시나리오 수
 */
export const SCENARIOS_PER_PROFILE = NEED_CATEGORIES.length * FLAGS.length * FLAGS.length;
