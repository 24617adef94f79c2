import { describe, it, expect } from 'vitest';
import { getCategoryTemplate } from './categories';
import {
  deriveExpectedStatus,
  deriveOutputs,
  deriveScenario,
  deriveScope,
  PREP_IMAGE_TAG,
  TEST_IMAGE_TAG,
} from './derivation';
import { buildProfile, composeProfile } from './profiles';
import { NEED_CATEGORIES } from './types';
import type { Derivation, ExpectedDerivation, Profile } from './types';

const alpine: Profile = composeProfile(getCategoryTemplate('alpine'), {
  id: 'alpine',
  baseImage: 'alpine:3.16',
  category: 'alpine',
});

const centos: Profile = buildProfile({
  id: 'centos_7',
  baseImage: 'centos:7',
  category: 'rhel7',
  scope: 'standard',
  prepCommand: 'yum install -y epel-release',
  hook: 'epel',
});

function expectRun(derivation: Derivation): ExpectedDerivation {
  if (derivation.skipped) {
    throw new Error(`unexpected skip: ${derivation.reason}`);
  }
  return derivation;
}

function patterns(derivation: ExpectedDerivation): string[] {
  return derivation.outputs.map((output) => output.pattern);
}

describe('deriveScenario', () => {
  it('needed + --force: 성공, 설정 이름과 수정 확인 출력', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'needed', forced: true, preprep: false })
    );

    expect(result.expectedStatus).toBe(0);
    expect(result.scope).toBe('standard');
    expect(result.command).toBe('apk add dbus');
    expect(patterns(result)).toEqual([
      'will use --force: alpine',
      '--force: init OK & modified 1 RUN instructions',
    ]);
  });

  it('needed, --force 없음: 실패와 --force 안내 출력', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'needed', forced: false, preprep: false })
    );

    expect(result.expectedStatus).toBe(1);
    expect(patterns(result)).toEqual([
      'available --force: alpine',
      'RUN: available here with --force',
      'build failed: --force may fix it',
    ]);
  });

  it('unneeded_fail, --force 없음: 실패하며 --force로도 해결 불가', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'unneeded_fail', forced: false, preprep: false })
    );

    expect(result.expectedStatus).toBe(1);
    expect(result.scope).toBe('full');
    expect(result.command).toBe('false');
    expect(patterns(result)).toEqual([
      'available --force: alpine',
      "build failed: current version of --force wouldn't help",
    ]);
  });

  it('unneeded_win + --force: 할 일 없음 경고', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'unneeded_win', forced: true, preprep: false })
    );

    expect(result.expectedStatus).toBe(0);
    expect(patterns(result)).toEqual([
      'will use --force: alpine',
      '--force specified, but nothing to do',
    ]);
  });

  it('fake_needed, --force 없음: 성공하지만 사용 가능 안내', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'fake_needed', forced: false, preprep: false })
    );

    expect(result.expectedStatus).toBe(0);
    expect(patterns(result)).toEqual([
      'available --force: alpine',
      'RUN: available here with --force',
    ]);
  });

  it('preprep + fake_needed는 forced 여부와 무관하게 건너뜀', () => {
    for (const forced of [false, true]) {
      expect(
        deriveScenario({ profile: alpine, category: 'fake_needed', forced, preprep: true })
      ).toEqual({ skipped: true, reason: 'preprep not needed' });
    }
  });

  it('preprep + needed + --force라도 사전 준비 명령이 없으면 건너뜀', () => {
    expect(
      deriveScenario({ profile: alpine, category: 'needed', forced: true, preprep: true })
    ).toEqual({ skipped: true, reason: 'no preparation command' });
  });

  it('카테고리 명령어가 없으면 건너뜀', () => {
    const arch = composeProfile(getCategoryTemplate('arch'), {
      id: 'archlinux',
      baseImage: 'archlinux:latest',
      category: 'arch',
    });

    expect(
      deriveScenario({ profile: arch, category: 'fake_needed', forced: true, preprep: false })
    ).toEqual({ skipped: true, reason: 'no fake_needed command' });
  });

  it('훅 프로필 preprep: 사전 준비 이미지에는 존재, 최종 이미지에서는 부재', () => {
    const result = expectRun(
      deriveScenario({ profile: centos, category: 'needed', forced: true, preprep: true })
    );

    expect(result.prepHook).toEqual({
      comment: 'validate EPEL installed',
      outputs: [{ pattern: '(Updating|Installing).+: epel-release', regex: true, invert: false }],
      files: [
        {
          pattern: 'enabled=1',
          path: 'etc/yum.repos.d/epel*.repo',
          image: PREP_IMAGE_TAG,
          invert: false,
        },
      ],
    });
    expect(result.finalHook?.files).toEqual([
      {
        pattern: 'enabled=1',
        path: 'etc/yum.repos.d/epel*.repo',
        image: TEST_IMAGE_TAG,
        invert: true,
      },
    ]);
  });

  it('훅 프로필, preprep 없이 --force 없음: 최종 이미지 존재 검증만', () => {
    const result = expectRun(
      deriveScenario({ profile: centos, category: 'unneeded_win', forced: false, preprep: false })
    );

    expect(result.prepHook).toBeUndefined();
    expect(result.finalHook?.comment).toBe('validate EPEL present');
    expect(result.finalHook?.files[0].invert).toBe(false);
  });

  it('훅 없는 프로필은 훅 검증 없음', () => {
    const result = expectRun(
      deriveScenario({ profile: alpine, category: 'needed', forced: true, preprep: false })
    );

    expect(result.prepHook).toBeUndefined();
    expect(result.finalHook).toBeUndefined();
  });
});

describe('deriveExpectedStatus', () => {
  it('unneeded_fail 이거나 --force 없는 needed일 때만 1', () => {
    for (const category of NEED_CATEGORIES) {
      for (const forced of [false, true]) {
        const expected = category === 'unneeded_fail' || (category === 'needed' && !forced) ? 1 : 0;
        expect(deriveExpectedStatus('alpine', category, forced)).toBe(expected);
      }
    }
  });
});

describe('deriveScope', () => {
  it('needed는 프로필 등급과 무관하게 standard', () => {
    expect(deriveScope('full', 'needed')).toBe('standard');
  });

  it('standard 프로필은 모든 카테고리가 standard', () => {
    for (const category of NEED_CATEGORIES) {
      expect(deriveScope('standard', category)).toBe('standard');
    }
  });

  it('full 프로필의 needed 외 카테고리는 full', () => {
    expect(deriveScope('full', 'unneeded_fail')).toBe('full');
    expect(deriveScope('full', 'unneeded_win')).toBe('full');
    expect(deriveScope('full', 'fake_needed')).toBe('full');
  });
});

describe('deriveOutputs', () => {
  it('모든 패턴은 반전 없는 고정 문자열', () => {
    for (const category of NEED_CATEGORIES) {
      for (const forced of [false, true]) {
        expect(deriveOutputs('rhel7', category, forced).every((o) => !o.invert && !o.regex)).toBe(true);
      }
    }
  });

  it('--force 시 첫 패턴은 설정 이름 포함', () => {
    expect(deriveOutputs('debderiv', 'unneeded_fail', true)).toEqual([
      { pattern: 'will use --force: debderiv', regex: false, invert: false },
    ]);
  });
});
