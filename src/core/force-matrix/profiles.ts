/**
 * Profile Registry
 * 카테고리 템플릿 + 배포판 오버라이드 + 훅 합성으로 프로필 목록 구성
 */

import * as fs from 'fs-extra';
import profileCatalog from './profiles.json';
import { CATEGORY_TEMPLATE_IDS, getCategoryTemplate, isCategoryTemplateId } from './categories';
import { ProfileConfigError } from './errors';
import { getCapabilityHook } from './hooks';
import { ARCHITECTURES, NEED_CATEGORIES, SCOPES } from './types';
import type {
  Architecture,
  CapabilityHook,
  CategoryTemplate,
  NeedCategory,
  NeedCommands,
  Profile,
  ProfileOverride,
  Scope,
} from './types';

const CATALOG_ID = '<catalog>';

const OVERRIDE_FIELDS = new Set([
  'id',
  'baseImage',
  'category',
  'config',
  'scope',
  'archExcludes',
  'prepCommand',
  'needs',
  'hook',
]);

// ============================================================================
// 합성
// ============================================================================

/**
 * 템플릿과 오버라이드를 필드 단위로 병합
 * 오버라이드 값 > 템플릿 값 > 없음
 */
export function composeProfile(template: CategoryTemplate, override: ProfileOverride): Profile {
  const needs: NeedCommands = { ...template.needs };
  for (const category of NEED_CATEGORIES) {
    const command = override.needs?.[category];
    if (command !== undefined) {
      needs[category] = command;
    }
  }

  const config = override.config ?? template.config;
  if (!config) {
    throw new ProfileConfigError(override.id, 'missing configuration name');
  }
  if (needs.unneeded_fail === undefined || needs.unneeded_win === undefined) {
    throw new ProfileConfigError(override.id, 'unneeded_fail and unneeded_win commands are required');
  }

  const prepCommand = override.prepCommand ?? template.prepCommand;

  return {
    id: override.id,
    baseImage: override.baseImage,
    config,
    scope: override.scope ?? template.scope,
    archExcludes: [...(override.archExcludes ?? template.archExcludes)],
    ...(prepCommand !== undefined ? { prepCommand } : {}),
    needs,
  };
}

/**
 * 프로필에 훅 부착 (프로필당 하나)
 */
export function attachHook(profile: Profile, hook: CapabilityHook): Profile {
  if (profile.hook && profile.hook !== hook) {
    throw new ProfileConfigError(
      profile.id,
      `already carries hook "${profile.hook.name}", cannot attach "${hook.name}"`
    );
  }
  return { ...profile, hook };
}

/**
 * 오버라이드 레코드로 최종 프로필 생성
 */
export function buildProfile(override: ProfileOverride): Profile {
  const profile = composeProfile(getCategoryTemplate(override.category), override);
  if (override.hook === undefined) {
    return profile;
  }

  const hook = getCapabilityHook(override.hook);
  if (!hook) {
    throw new ProfileConfigError(override.id, `unknown hook "${override.hook}"`);
  }
  return attachHook(profile, hook);
}

// ============================================================================
// 정의 파일 검증
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNeedCategory(value: string): value is NeedCategory {
  return NEED_CATEGORIES.some((category) => category === value);
}

function isScope(value: unknown): value is Scope {
  return SCOPES.some((scope) => scope === value);
}

function isArchitecture(value: unknown): value is Architecture {
  return ARCHITECTURES.some((arch) => arch === value);
}

// 주석과 heredoc 본문에 그대로 들어가므로 줄바꿈 불가
function isMultiLine(value: string): boolean {
  return /[\r\n]/.test(value);
}

function optionalString(id: string, entry: Record<string, unknown>, field: string): string | undefined {
  const value = entry[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ProfileConfigError(id, `${field} must be a non-empty string`);
  }
  if (isMultiLine(value)) {
    throw new ProfileConfigError(id, `${field} must be a single line`);
  }
  return value;
}

function requiredString(id: string, entry: Record<string, unknown>, field: string): string {
  const value = optionalString(id, entry, field);
  if (value === undefined) {
    throw new ProfileConfigError(id, `missing ${field}`);
  }
  return value;
}

function parseNeeds(id: string, value: unknown): NeedCommands | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ProfileConfigError(id, 'needs must be an object');
  }

  const needs: NeedCommands = {};
  for (const [key, command] of Object.entries(value)) {
    if (!isNeedCategory(key)) {
      throw new ProfileConfigError(id, `undefined need category "${key}"`);
    }
    if (typeof command !== 'string' || command.trim() === '') {
      throw new ProfileConfigError(id, `command for ${key} must be a non-empty string`);
    }
    if (isMultiLine(command)) {
      throw new ProfileConfigError(id, `command for ${key} must be a single line`);
    }
    needs[key] = command;
  }
  return needs;
}

function parseArchExcludes(id: string, value: unknown): Architecture[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ProfileConfigError(id, 'archExcludes must be an array');
  }

  const archs: Architecture[] = [];
  for (const arch of value) {
    if (!isArchitecture(arch)) {
      throw new ProfileConfigError(id, `unknown architecture "${String(arch)}"`);
    }
    archs.push(arch);
  }
  return archs;
}

function parseOverride(entry: unknown, index: number): ProfileOverride {
  if (!isRecord(entry)) {
    throw new ProfileConfigError(`#${index}`, 'profile entry must be an object');
  }

  const id = requiredString(`#${index}`, entry, 'id');

  for (const field of Object.keys(entry)) {
    if (!OVERRIDE_FIELDS.has(field)) {
      throw new ProfileConfigError(id, `unknown field "${field}"`);
    }
  }

  const category = requiredString(id, entry, 'category');
  if (!isCategoryTemplateId(category)) {
    throw new ProfileConfigError(
      id,
      `unknown category template "${category}" (expected one of ${CATEGORY_TEMPLATE_IDS.join(', ')})`
    );
  }

  let scope: Scope | undefined;
  if (entry.scope !== undefined) {
    if (!isScope(entry.scope)) {
      throw new ProfileConfigError(id, `unknown scope "${String(entry.scope)}"`);
    }
    scope = entry.scope;
  }

  const hook = optionalString(id, entry, 'hook');
  if (hook !== undefined && !getCapabilityHook(hook)) {
    throw new ProfileConfigError(id, `unknown hook "${hook}"`);
  }

  return {
    id,
    baseImage: requiredString(id, entry, 'baseImage'),
    category,
    config: optionalString(id, entry, 'config'),
    scope,
    archExcludes: parseArchExcludes(id, entry.archExcludes),
    prepCommand: optionalString(id, entry, 'prepCommand'),
    needs: parseNeeds(id, entry.needs),
    hook,
  };
}

/**
 * 프로필 정의 파일 내용을 검증하여 오버라이드 목록으로 변환
 */
export function parseProfileDefinitions(raw: unknown): ProfileOverride[] {
  if (!isRecord(raw) || !Array.isArray(raw.profiles)) {
    throw new ProfileConfigError(CATALOG_ID, 'expected an object with a "profiles" array');
  }

  const seen = new Set<string>();
  return raw.profiles.map((entry: unknown, index: number) => {
    const override = parseOverride(entry, index);
    if (seen.has(override.id)) {
      throw new ProfileConfigError(override.id, 'duplicate profile id');
    }
    seen.add(override.id);
    return override;
  });
}

// ============================================================================
// 레지스트리
// ============================================================================

/**
 * 등록 순서를 유지하는 프로필 레지스트리
 */
export class ProfileRegistry {
  private profiles: Profile[] = [];
  private byId = new Map<string, Profile>();

  /**
   * 프로필 등록
   * 같은 객체의 재등록은 무시, 같은 ID의 다른 프로필은 오류
   */
  register(profile: Profile): this {
    const existing = this.byId.get(profile.id);
    if (existing === profile) {
      return this;
    }
    if (existing) {
      throw new ProfileConfigError(profile.id, 'duplicate profile id');
    }

    this.profiles.push(profile);
    this.byId.set(profile.id, profile);
    return this;
  }

  list(): readonly Profile[] {
    return [...this.profiles];
  }

  get(id: string): Profile | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.profiles.length;
  }

  /**
   * 주어진 ID만 등록 순서대로 선택한 새 레지스트리
   */
  select(ids: readonly string[]): ProfileRegistry {
    for (const id of ids) {
      if (!this.byId.has(id)) {
        throw new ProfileConfigError(id, 'not found in registry');
      }
    }

    const wanted = new Set(ids);
    const selected = new ProfileRegistry();
    for (const profile of this.profiles) {
      if (wanted.has(profile.id)) {
        selected.register(profile);
      }
    }
    return selected;
  }

  /**
   * 정의 파일 내용으로 레지스트리 생성
   */
  static fromDefinitions(raw: unknown): ProfileRegistry {
    const registry = new ProfileRegistry();
    for (const override of parseProfileDefinitions(raw)) {
      registry.register(buildProfile(override));
    }
    return registry;
  }
}

/**
 * 내장 프로필 카탈로그로 레지스트리 생성
 */
export function loadDefaultRegistry(): ProfileRegistry {
  return ProfileRegistry.fromDefinitions(profileCatalog);
}

/**
 * 사용자 정의 파일로 레지스트리 생성
 */
export function loadRegistryFromFile(filePath: string): ProfileRegistry {
  const raw: unknown = fs.readJsonSync(filePath);
  return ProfileRegistry.fromDefinitions(raw);
}
