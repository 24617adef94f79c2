import chalk from 'chalk';
import Table from 'cli-table3';
import * as fs from 'fs-extra';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { generateForceTests } from '../../core/force-matrix';
import type { GenerationSummary } from '../../core/force-matrix';
import logger from '../../utils/logger';
import { exitWithError, resolveRegistry, scriptOptionsFromConfig } from './shared';
import type { ProfileSelectionOptions } from './shared';

export interface GenerateOptions extends ProfileSelectionOptions {
  /** 출력 파일 경로 */
  output?: string;
  /** 파일 대신 stdout으로 출력 */
  stdout?: boolean;
}

/**
 * BATS 스크립트 생성
 */
export async function generateCommand(options: GenerateOptions): Promise<void> {
  try {
    await logger.initialize();
    const config = getConfigManager().getConfig();
    const registry = resolveRegistry(options, config);
    const { script, summary } = generateForceTests(registry, scriptOptionsFromConfig(config));

    if (options.stdout) {
      process.stdout.write(script);
      logger.info('스크립트 출력 완료', { emitted: summary.emitted, skipped: summary.skipped });
      return;
    }

    const outputPath = path.resolve(options.output ?? config.outputPath);
    await fs.outputFile(outputPath, script);
    logger.info('스크립트 저장 완료', { outputPath });

    console.log(chalk.green(`✓ ${outputPath}`));
    console.log(
      chalk.gray(`  테스트 ${summary.emitted}개 생성, ${summary.skipped}개 건너뜀 (전체 ${summary.total}개)`)
    );
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * 요약 테이블 문자열
 */
export function formatSummary(summary: GenerationSummary): string {
  const table = new Table({
    head: [chalk.cyan('항목'), chalk.cyan('수')],
    colWidths: [40, 10],
  });

  table.push(['전체 시나리오', String(summary.total)]);
  table.push(['생성된 테스트', String(summary.emitted)]);
  table.push(['  standard', String(summary.byScope.standard)]);
  table.push(['  full', String(summary.byScope.full)]);
  table.push(['건너뜀', String(summary.skipped)]);
  for (const [reason, count] of Object.entries(summary.skipReasons)) {
    table.push([`  ${reason}`, String(count)]);
  }

  return table.toString();
}

/**
 * 파일을 쓰지 않고 생성 결과 요약만 출력
 */
export async function summaryCommand(options: ProfileSelectionOptions): Promise<void> {
  try {
    const config = getConfigManager().getConfig();
    const registry = resolveRegistry(options, config);
    const { summary } = generateForceTests(registry, scriptOptionsFromConfig(config));

    console.log(chalk.cyan(`\n프로필 ${registry.size}개 생성 요약:\n`));
    console.log(formatSummary(summary));
  } catch (error) {
    exitWithError(error);
  }
}
