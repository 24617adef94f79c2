/**
 * Force Matrix Generator
 * 레지스트리 → 열거 → 도출 → 렌더링
 */

import logger from '../../utils/logger';
import { deriveScenario } from './derivation';
import { enumerateScenarios } from './enumerator';
import { getBatsScriptGenerator } from './script-generator';
import type { BatsScriptOptions } from './script-generator';
import type { ProfileRegistry } from './profiles';
import type { DerivedScenario, GenerationSummary } from './types';

export interface ForceTestGenerationResult {
  /** 생성된 BATS 스크립트 */
  script: string;
  summary: GenerationSummary;
}

/**
 * 레지스트리의 모든 시나리오 도출
 */
export function deriveAll(registry: ProfileRegistry): DerivedScenario[] {
  const pairs: DerivedScenario[] = [];
  for (const scenario of enumerateScenarios(registry.list())) {
    pairs.push({ scenario, derivation: deriveScenario(scenario) });
  }
  return pairs;
}

/**
 * --force 테스트 스크립트 생성
 * 설정 오류(ProfileConfigError)는 그대로 전파되어 전체 생성이 중단됨
 */
export function generateForceTests(
  registry: ProfileRegistry,
  options: BatsScriptOptions = {}
): ForceTestGenerationResult {
  logger.debug('시나리오 도출 시작', { profiles: registry.size });

  const pairs = deriveAll(registry);
  const generator = getBatsScriptGenerator();
  const summary = generator.summarize(pairs);
  const script = generator.generate(pairs, options);

  logger.debug('스크립트 생성 완료', {
    total: summary.total,
    emitted: summary.emitted,
    skipped: summary.skipped,
  });

  return { script, summary };
}
