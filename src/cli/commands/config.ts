import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isConfigKey } from '../../core/config';

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const config = getConfigManager().getConfig();

  if (key) {
    const value = isConfigKey(key) ? config[key] : undefined;
    if (value !== undefined) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(value)));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(config, null, 2));
  }
}

/**
 * 설정값 변경
 */
export async function configSet(key: string, value: string): Promise<void> {
  try {
    getConfigManager().set(key, value);
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(value)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const config = getConfigManager().getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [20, 32, 30],
  });

  const descriptions: Record<string, string> = {
    builderCommand: '빌드 명령어',
    builderName: '빌더 이름 (setup 가드)',
    builderVariable: '빌더 환경 변수',
    storageVariable: '이미지 저장소 환경 변수',
    commonLoadPath: 'load 할 공통 헬퍼',
    outputPath: '기본 출력 파일',
    profilesPath: '프로필 정의 파일',
    logLevel: '로그 레벨',
  };

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), descriptions[key] || '-']);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  try {
    getConfigManager().reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }
}
