import { describe, it, expect } from 'vitest';
import { createCapabilityHook, epelHook, getCapabilityHook, getCapabilityHookNames } from './hooks';

describe('capability hooks', () => {
  it('이름으로 EPEL 훅 조회', () => {
    expect(getCapabilityHook('epel')).toBe(epelHook);
    expect(getCapabilityHook('powertools')).toBeUndefined();
    expect(getCapabilityHookNames()).toEqual(['epel']);
  });

  it('사전 준비 검증은 출력과 파일 모두 존재', () => {
    const hook = createCapabilityHook({
      name: 'extras',
      description: 'extras repo',
      outputs: ['Installing: extras-release', 'Complete!'],
      files: [{ pattern: '^enabled=1$', path: 'etc/yum.repos.d/extras.repo' }],
    });

    expect(hook.prepAssertions('prep')).toEqual({
      comment: 'validate extras repo installed',
      outputs: [
        { pattern: 'Installing: extras-release', regex: true, invert: false },
        { pattern: 'Complete!', regex: true, invert: false },
      ],
      files: [
        { pattern: '^enabled=1$', path: 'etc/yum.repos.d/extras.repo', image: 'prep', invert: false },
      ],
    });
  });

  it('최종 검증은 --force일 때 반전', () => {
    const forced = epelHook.finalAssertions('final', true);
    const unforced = epelHook.finalAssertions('final', false);

    expect(forced.comment).toBe('validate EPEL removed by --force');
    expect(forced.outputs).toEqual([]);
    expect(forced.files.map((f) => f.invert)).toEqual([true]);
    expect(unforced.files.map((f) => f.invert)).toEqual([false]);
    expect(unforced.files[0].image).toBe('final');
  });
});
