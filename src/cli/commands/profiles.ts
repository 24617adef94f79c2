import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager } from '../../core/config';
import type { Profile } from '../../core/force-matrix';
import { exitWithError, resolveRegistry } from './shared';
import type { ProfileSelectionOptions } from './shared';

/**
 * 프로필 한 줄 요약
 */
export function profileRow(profile: Profile): string[] {
  return [
    profile.id,
    profile.baseImage,
    profile.config,
    profile.scope,
    profile.archExcludes.join(', ') || '-',
    profile.prepCommand ?? '-',
    profile.hook?.name ?? '-',
  ];
}

/**
 * 프로필 목록 조회
 */
export async function listProfilesCommand(options: ProfileSelectionOptions): Promise<void> {
  try {
    const registry = resolveRegistry(options, getConfigManager().getConfig());

    const table = new Table({
      head: ['ID', '베이스 이미지', '설정', '등급', '제외 아키텍처', '사전 준비', '훅'].map((h) =>
        chalk.cyan(h)
      ),
    });
    for (const profile of registry.list()) {
      table.push(profileRow(profile));
    }

    console.log(chalk.cyan(`\n프로필 ${registry.size}개\n`));
    console.log(table.toString());
  } catch (error) {
    exitWithError(error);
  }
}
