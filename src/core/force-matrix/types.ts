/**
 * Force Matrix Types
 * ch-image --force 테스트 매트릭스 생성을 위한 공통 타입 정의
 */

// 명령어와 --force 우회 기능의 관계
// - unneeded_fail: --force와 무관하게 항상 실패
// - unneeded_win: --force와 무관하게 항상 성공
// - fake_needed: --force가 필요해 보이지만 실제로는 불필요
// - needed: --force가 있어야만 성공
export type NeedCategory = 'unneeded_fail' | 'unneeded_win' | 'fake_needed' | 'needed';

// 테스트 실행 등급
export type Scope = 'standard' | 'full';

// 아키텍처 타입 (arch_exclude 대상)
export type Architecture = 'x86_64' | 'aarch64' | 'ppc64le';

// 패키지 관리자 카테고리 템플릿 ID
export type CategoryTemplateId =
  | 'rhel7'     // yum
  | 'rhel8'     // dnf
  | 'fedora'    // dnf
  | 'debderiv'  // apt
  | 'suse'      // zypper
  | 'arch'      // pacman
  | 'alpine';   // apk

/** 열거 순서가 고정된 니드 카테고리 목록 */
export const NEED_CATEGORIES: readonly NeedCategory[] = [
  'unneeded_fail',
  'unneeded_win',
  'fake_needed',
  'needed',
] as const;

export const SCOPES: readonly Scope[] = ['standard', 'full'] as const;

export const ARCHITECTURES: readonly Architecture[] = ['x86_64', 'aarch64', 'ppc64le'] as const;

/**
 * 니드 카테고리별 RUN 명령어
 * 누락된 카테고리는 해당 시나리오를 건너뜀
 */
export type NeedCommands = Partial<Record<NeedCategory, string>>;

/**
 * 출력 패턴 검증 (echo "$output" | grep -Fq / -Eq)
 */
export interface OutputAssertion {
  /** 고정 문자열 또는 확장 정규식 */
  pattern: string;
  /** true면 확장 정규식(-E), false면 고정 문자열(-F) */
  regex: boolean;
  /** true면 패턴이 없어야 함 */
  invert: boolean;
}

/**
 * 이미지 파일 검증 (ls + grep)
 */
export interface FileAssertion {
  /** 확장 정규식 패턴 */
  pattern: string;
  /** 이미지 루트 기준 상대 경로 (glob 허용) */
  path: string;
  /** 검사할 이미지 태그 */
  image: string;
  /** true면 파일이 없거나 패턴이 없어야 함 */
  invert: boolean;
}

/**
 * 훅이 빌드 단계 뒤에 추가하는 검증 묶음
 */
export interface HookAssertions {
  /** 블록 앞에 붙는 주석 */
  comment: string;
  outputs: OutputAssertion[];
  files: FileAssertion[];
}

/**
 * 능력 훅
 * 카테고리와 독립적으로 프로필에 부착되는 부가 검증 (예: EPEL 활성화)
 */
export interface CapabilityHook {
  /** 훅 이름 (profiles.json에서 참조) */
  name: string;
  /** 설명 */
  description: string;
  /** 설치 시 빌드 출력에 나타나야 하는 패턴 */
  outputs: readonly string[];
  /** 설치 결과로 존재해야 하는 파일 내용 (pattern, path) */
  files: readonly { pattern: string; path: string }[];
  /** 빌드 1(사전 준비 이미지) 직후 검증 */
  prepAssertions(image: string): HookAssertions;
  /** 빌드 2(테스트 대상 이미지) 직후 검증 */
  finalAssertions(image: string, forced: boolean): HookAssertions;
}

/**
 * 패키지 관리자 카테고리 템플릿
 */
export interface CategoryTemplate {
  id: CategoryTemplateId;
  /** --force 설정 이름 */
  config: string;
  /** 기본 실행 등급 */
  scope: Scope;
  /** 제외 아키텍처 */
  archExcludes: readonly Architecture[];
  /** 사전 준비 명령어 */
  prepCommand?: string;
  /** 니드 카테고리별 명령어 */
  needs: NeedCommands;
}

/**
 * 배포판별 오버라이드 레코드 (profiles.json 항목)
 */
export interface ProfileOverride {
  /** 프로필 고유 ID (예: 'centos_7', 'alpine_316') */
  id: string;
  /** 베이스 이미지 (예: 'centos:7') */
  baseImage: string;
  /** 카테고리 템플릿 ID */
  category: CategoryTemplateId;
  config?: string;
  scope?: Scope;
  archExcludes?: readonly Architecture[];
  prepCommand?: string;
  needs?: NeedCommands;
  /** 부착할 훅 이름 */
  hook?: string;
}

/**
 * 최종 프로필
 */
export interface Profile {
  readonly id: string;
  readonly baseImage: string;
  readonly config: string;
  readonly scope: Scope;
  readonly archExcludes: readonly Architecture[];
  readonly prepCommand?: string;
  readonly needs: Readonly<NeedCommands>;
  readonly hook?: CapabilityHook;
}

/**
 * 열거 단위 시나리오
 */
export interface Scenario {
  readonly profile: Profile;
  readonly category: NeedCategory;
  readonly forced: boolean;
  readonly preprep: boolean;
}

/**
 * 건너뛴 시나리오
 */
export interface SkippedDerivation {
  readonly skipped: true;
  readonly reason: string;
}

/**
 * 실행할 시나리오의 기대 결과
 */
export interface ExpectedDerivation {
  readonly skipped: false;
  readonly scope: Scope;
  /** 빌드 2의 기대 종료 코드 */
  readonly expectedStatus: 0 | 1;
  /** 빌드 2에서 실행할 RUN 명령어 */
  readonly command: string;
  readonly outputs: readonly OutputAssertion[];
  /** 빌드 1 이후 훅 검증 (preprep일 때만) */
  readonly prepHook?: HookAssertions;
  /** 빌드 2 이후 훅 검증 */
  readonly finalHook?: HookAssertions;
}

export type Derivation = SkippedDerivation | ExpectedDerivation;

/**
 * 시나리오와 도출 결과 쌍
 */
export interface DerivedScenario {
  readonly scenario: Scenario;
  readonly derivation: Derivation;
}

/**
 * 생성 요약
 */
export interface GenerationSummary {
  /** 전체 시나리오 수 */
  total: number;
  /** 생성된 테스트 수 */
  emitted: number;
  /** 건너뛴 시나리오 수 */
  skipped: number;
  /** 등급별 테스트 수 */
  byScope: Record<Scope, number>;
  /** 건너뛴 사유별 수 */
  skipReasons: Record<string, number>;
}
