/**
 * Package Manager Category Templates
 * 패키지 관리자 계열별 --force 기본 명령어 템플릿
 */

import type { CategoryTemplate, CategoryTemplateId, NeedCommands } from './types';

// 모든 계열에 공통인 기본 명령어
const BASELINE_NEEDS: NeedCommands = {
  unneeded_fail: 'false',
  unneeded_win: 'true',
};

// ============================================================================
// RPM 계열
// ============================================================================

const rhel7: CategoryTemplate = {
  id: 'rhel7',
  config: 'rhel7',
  scope: 'full',
  archExcludes: [],
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'yum install -y ed',
    needed: 'yum install -y openssh',
  },
};

const rhel8: CategoryTemplate = {
  id: 'rhel8',
  config: 'rhel8',
  scope: 'full',
  archExcludes: [],
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'dnf install -y ed',
    needed: 'dnf install -y openssh',
  },
};

const fedora: CategoryTemplate = {
  id: 'fedora',
  config: 'fedora',
  scope: 'full',
  archExcludes: [],
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'dnf install -y ed',
    needed: 'dnf install -y openssh',
  },
};

// ============================================================================
// Debian 계열
// ============================================================================

const debderiv: CategoryTemplate = {
  id: 'debderiv',
  config: 'debderiv',
  scope: 'full',
  archExcludes: [],
  prepCommand: 'apt-get update',
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'apt-get update',
    needed: 'apt-get update && apt-get install -y openssh-client',
  },
};

// ============================================================================
// 기타
// ============================================================================

const suse: CategoryTemplate = {
  id: 'suse',
  config: 'suse',
  scope: 'full',
  archExcludes: [],
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'zypper install -y ed',
    needed: 'zypper install -y dbus-1',
  },
};

// pacman은 fake_needed에 해당하는 명령어가 없음
const arch: CategoryTemplate = {
  id: 'arch',
  config: 'arch',
  scope: 'full',
  archExcludes: ['aarch64', 'ppc64le'],
  needs: {
    ...BASELINE_NEEDS,
    needed: 'pacman -Syq --noconfirm dbus',
  },
};

const alpine: CategoryTemplate = {
  id: 'alpine',
  config: 'alpine',
  scope: 'full',
  archExcludes: [],
  needs: {
    ...BASELINE_NEEDS,
    fake_needed: 'apk add ed',
    needed: 'apk add dbus',
  },
};

export const CATEGORY_TEMPLATES: Record<CategoryTemplateId, CategoryTemplate> = {
  rhel7,
  rhel8,
  fedora,
  debderiv,
  suse,
  arch,
  alpine,
};

export const CATEGORY_TEMPLATE_IDS: readonly CategoryTemplateId[] = [
  'rhel7',
  'rhel8',
  'fedora',
  'debderiv',
  'suse',
  'arch',
  'alpine',
];

/**
 * 템플릿 ID 여부 확인
 */
export function isCategoryTemplateId(value: string): value is CategoryTemplateId {
  return Object.prototype.hasOwnProperty.call(CATEGORY_TEMPLATES, value);
}

/**
 * 템플릿 ID로 템플릿 조회
 */
export function getCategoryTemplate(id: CategoryTemplateId): CategoryTemplate {
  return CATEGORY_TEMPLATES[id];
}
