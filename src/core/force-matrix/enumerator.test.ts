import { describe, it, expect } from 'vitest';
import { enumerateScenarios, SCENARIOS_PER_PROFILE } from './enumerator';
import { loadDefaultRegistry } from './profiles';

describe('enumerateScenarios', () => {
  const profiles = loadDefaultRegistry().list().slice(0, 2);
  const scenarios = [...enumerateScenarios(profiles)];

  it('프로필당 16개 시나리오', () => {
    expect(SCENARIOS_PER_PROFILE).toBe(16);
    expect(scenarios).toHaveLength(32);
  });

  it('카테고리 → forced → preprep 순서', () => {
    const head = scenarios.slice(0, 5).map((s) => [s.category, s.forced, s.preprep]);
    expect(head).toEqual([
      ['unneeded_fail', false, false],
      ['unneeded_fail', false, true],
      ['unneeded_fail', true, false],
      ['unneeded_fail', true, true],
      ['unneeded_win', false, false],
    ]);
    expect(scenarios[15].category).toBe('needed');
    expect(scenarios[15].forced).toBe(true);
    expect(scenarios[15].preprep).toBe(true);
  });

  it('프로필 선언 순서 유지', () => {
    expect(scenarios[0].profile.id).toBe('centos_7');
    expect(scenarios[16].profile.id).toBe('amazonlinux_2');
  });

  it('빈 목록은 시나리오 없음', () => {
    expect([...enumerateScenarios([])]).toEqual([]);
  });
});
