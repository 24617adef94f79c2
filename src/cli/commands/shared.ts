import chalk from 'chalk';
import type { Config } from '../../core/config';
import {
  ProfileConfigError,
  ProfileRegistry,
  loadDefaultRegistry,
  loadRegistryFromFile,
} from '../../core/force-matrix';
import type { BatsScriptOptions } from '../../core/force-matrix';
import logger from '../../utils/logger';

/**
 * 프로필 선택 옵션 (generate, summary, list-profiles 공통)
 */
export interface ProfileSelectionOptions {
  /** 사용자 프로필 정의 파일 */
  profiles?: string;
  /** 선택할 프로필 ID */
  profile?: string[];
}

/**
 * 옵션과 설정으로 레지스트리 구성
 * --profiles > 설정의 profilesPath > 내장 카탈로그
 */
export function resolveRegistry(options: ProfileSelectionOptions, config: Config): ProfileRegistry {
  const profilesPath = options.profiles ?? config.profilesPath;
  const registry = profilesPath ? loadRegistryFromFile(profilesPath) : loadDefaultRegistry();

  if (options.profile && options.profile.length > 0) {
    return registry.select(options.profile);
  }
  return registry;
}

/**
 * 설정에서 스크립트 생성 옵션 추출
 */
export function scriptOptionsFromConfig(config: Config): BatsScriptOptions {
  return {
    builderCommand: config.builderCommand,
    builderName: config.builderName,
    builderVariable: config.builderVariable,
    storageVariable: config.storageVariable,
    commonLoadPath: config.commonLoadPath,
  };
}

/**
 * 명령어 실패 처리 후 종료
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ProfileConfigError) {
    logger.logError(error, '프로필 설정 오류');
    console.error(chalk.red(`프로필 설정 오류: ${error.message}`));
  } else if (error instanceof Error) {
    logger.logError(error);
    console.error(chalk.red(`오류: ${error.message}`));
  } else {
    console.error(chalk.red(`오류: ${String(error)}`));
  }
  process.exit(1);
}
