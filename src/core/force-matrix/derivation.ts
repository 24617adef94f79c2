/**
 * Derivation Engine
 * 시나리오 하나에 대한 기대 결과(건너뜀 여부, 등급, 종료 코드, 출력 검증) 도출
 */

import { ProfileConfigError } from './errors';
import type {
  Derivation,
  HookAssertions,
  NeedCategory,
  OutputAssertion,
  Scenario,
  Scope,
} from './types';

/** 빌드 1(사전 준비) 이미지 태그 */
export const PREP_IMAGE_TAG = 'tmpimg-prep';

/** 빌드 2(테스트 대상) 이미지 태그 */
export const TEST_IMAGE_TAG = 'tmpimg';

export const SKIP_REASONS = {
  preprepNotNeeded: 'preprep not needed',
  noPrepCommand: 'no preparation command',
  noCommand: (category: NeedCategory): string => `no ${category} command`,
};

/**
 * 시나리오 결과 도출 (우선순위 순서로 규칙 적용)
 */
export function deriveScenario(scenario: Scenario): Derivation {
  const { profile, category, forced, preprep } = scenario;

  // 사전 준비 이미지는 "이미 우회가 적용된" 경우만 검증
  if (preprep && !(forced && category === 'needed')) {
    return { skipped: true, reason: SKIP_REASONS.preprepNotNeeded };
  }
  if (preprep && profile.prepCommand === undefined) {
    return { skipped: true, reason: SKIP_REASONS.noPrepCommand };
  }

  const command = profile.needs[category];
  if (command === undefined) {
    return { skipped: true, reason: SKIP_REASONS.noCommand(category) };
  }

  let prepHook: HookAssertions | undefined;
  let finalHook: HookAssertions | undefined;
  if (profile.hook) {
    prepHook = preprep ? profile.hook.prepAssertions(PREP_IMAGE_TAG) : undefined;
    finalHook = profile.hook.finalAssertions(TEST_IMAGE_TAG, forced);
  }

  return {
    skipped: false,
    scope: deriveScope(profile.scope, category),
    expectedStatus: deriveExpectedStatus(profile.id, category, forced),
    command,
    outputs: deriveOutputs(profile.config, category, forced),
    ...(prepHook ? { prepHook } : {}),
    ...(finalHook ? { finalHook } : {}),
  };
}

/**
 * 우회가 실제로 필요함을 증명하는 시나리오는 항상 standard
 */
export function deriveScope(profileScope: Scope, category: NeedCategory): Scope {
  return profileScope === 'standard' || category === 'needed' ? 'standard' : 'full';
}

export function deriveExpectedStatus(
  profileId: string,
  category: NeedCategory,
  forced: boolean
): 0 | 1 {
  switch (category) {
    case 'unneeded_fail':
      return 1;
    case 'needed':
      return forced ? 0 : 1;
    case 'unneeded_win':
    case 'fake_needed':
      return 0;
    default: {
      const unmatched: never = category;
      throw new ProfileConfigError(profileId, `no status rule for category "${String(unmatched)}"`);
    }
  }
}

/**
 * 빌드 2 출력에 나타나야 하는 패턴 (순서 유지)
 */
export function deriveOutputs(
  config: string,
  category: NeedCategory,
  forced: boolean
): OutputAssertion[] {
  const patterns: string[] = [];
  const modifiesRun = category === 'needed' || category === 'fake_needed';

  if (forced) {
    patterns.push(`will use --force: ${config}`);
    if (category === 'unneeded_win') {
      patterns.push('--force specified, but nothing to do');
    }
    if (modifiesRun) {
      patterns.push('--force: init OK & modified 1 RUN instructions');
    }
  } else {
    patterns.push(`available --force: ${config}`);
    if (modifiesRun) {
      patterns.push('RUN: available here with --force');
    }
    if (category === 'needed') {
      patterns.push('build failed: --force may fix it');
    }
    if (category === 'unneeded_fail') {
      patterns.push("build failed: current version of --force wouldn't help");
    }
  }

  // 설정 이름이 들어가므로 정규식이 아닌 고정 문자열로 비교
  return patterns.map((pattern) => ({ pattern, regex: false, invert: false }));
}
