/**
 * Capability Hooks
 * 카테고리 템플릿과 독립적으로 프로필에 부착하는 부가 검증
 */

import type { CapabilityHook, FileAssertion, HookAssertions } from './types';

/**
 * 훅 정의
 */
export interface CapabilityHookDefinition {
  name: string;
  description: string;
  outputs: readonly string[];
  files: readonly { pattern: string; path: string }[];
}

/**
 * 정의로부터 훅 생성
 *
 * 시나리오마다 설치 경로는 하나뿐이라고 가정한다. 빌드 1에서 설치했다면
 * 사전 준비 이미지에 있어야 하고, 빌드 2가 --force 경로로 설치했다면 최종
 * 이미지에서는 사라져 있어야 한다.
 */
export function createCapabilityHook(definition: CapabilityHookDefinition): CapabilityHook {
  const toFiles = (image: string, invert: boolean): FileAssertion[] =>
    definition.files.map((file) => ({
      pattern: file.pattern,
      path: file.path,
      image,
      invert,
    }));

  return {
    name: definition.name,
    description: definition.description,
    outputs: definition.outputs,
    files: definition.files,

    prepAssertions(image: string): HookAssertions {
      return {
        comment: `validate ${definition.description} installed`,
        outputs: definition.outputs.map((pattern) => ({ pattern, regex: true, invert: false })),
        files: toFiles(image, false),
      };
    },

    finalAssertions(image: string, forced: boolean): HookAssertions {
      return {
        comment: forced
          ? `validate ${definition.description} removed by --force`
          : `validate ${definition.description} present`,
        outputs: [],
        files: toFiles(image, forced),
      };
    },
  };
}

// EPEL 저장소 활성화 (RHEL 계열)
export const epelHook = createCapabilityHook({
  name: 'epel',
  description: 'EPEL',
  outputs: ['(Updating|Installing).+: epel-release'],
  files: [{ pattern: 'enabled=1', path: 'etc/yum.repos.d/epel*.repo' }],
});

const HOOKS: ReadonlyMap<string, CapabilityHook> = new Map([[epelHook.name, epelHook]]);

/**
 * 이름으로 훅 조회
 */
export function getCapabilityHook(name: string): CapabilityHook | undefined {
  return HOOKS.get(name);
}

export function getCapabilityHookNames(): string[] {
  return [...HOOKS.keys()];
}
