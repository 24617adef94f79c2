/**
 * Force Matrix Module
 * ch-image --force 테스트 시나리오 도출 및 BATS 생성 모듈
 */

// Types
export type {
  NeedCategory,
  Scope,
  Architecture,
  CategoryTemplateId,
  NeedCommands,
  OutputAssertion,
  FileAssertion,
  HookAssertions,
  CapabilityHook,
  CategoryTemplate,
  ProfileOverride,
  Profile,
  Scenario,
  SkippedDerivation,
  ExpectedDerivation,
  Derivation,
  DerivedScenario,
  GenerationSummary,
} from './types';
export { NEED_CATEGORIES, SCOPES, ARCHITECTURES } from './types';

export { ProfileConfigError } from './errors';

// Category Templates
export {
  CATEGORY_TEMPLATES,
  CATEGORY_TEMPLATE_IDS,
  getCategoryTemplate,
  isCategoryTemplateId,
} from './categories';

// Capability Hooks
export { createCapabilityHook, epelHook, getCapabilityHook, getCapabilityHookNames } from './hooks';
export type { CapabilityHookDefinition } from './hooks';

// Profile Registry
export {
  ProfileRegistry,
  composeProfile,
  attachHook,
  buildProfile,
  parseProfileDefinitions,
  loadDefaultRegistry,
  loadRegistryFromFile,
} from './profiles';

// Enumerator / Derivation
export { enumerateScenarios, SCENARIOS_PER_PROFILE } from './enumerator';
export {
  deriveScenario,
  deriveScope,
  deriveExpectedStatus,
  deriveOutputs,
  PREP_IMAGE_TAG,
  TEST_IMAGE_TAG,
  SKIP_REASONS,
} from './derivation';

// Script Generator
export {
  BatsScriptGenerator,
  getBatsScriptGenerator,
  scenarioLabel,
  escapeDoubleQuoted,
  singleQuote,
} from './script-generator';
export type { BatsScriptOptions } from './script-generator';

export { deriveAll, generateForceTests } from './generator';
export type { ForceTestGenerationResult } from './generator';
