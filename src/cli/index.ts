#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';

// 버전 정보
const VERSION = '1.0.0';

// 메인 프로그램
const program = new Command();

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

program
  .name('forcegen')
  .description(chalk.cyan('forcegen - ch-image --force 테스트 생성기'))
  .version(VERSION, '-v, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시');

// generate 명령어
program
  .command('generate')
  .description('BATS 테스트 파일 생성')
  .option('-o, --output <path>', '출력 경로 (기본값: 설정의 outputPath)')
  .option('--stdout', '파일 대신 표준 출력으로 출력')
  .option('-p, --profile <id>', '생성할 프로필 ID (반복 가능)', collect)
  .option('--profiles <file>', '프로필 정의 파일 (JSON)')
  .action(async (options) => {
    const { generateCommand } = await import('./commands/generate');
    await generateCommand(options);
  });

// summary 명령어
program
  .command('summary')
  .description('생성될 테스트 수 요약')
  .option('-p, --profile <id>', '요약할 프로필 ID (반복 가능)', collect)
  .option('--profiles <file>', '프로필 정의 파일 (JSON)')
  .action(async (options) => {
    const { summaryCommand } = await import('./commands/generate');
    await summaryCommand(options);
  });

// list-profiles 명령어
program
  .command('list-profiles')
  .description('프로필 목록 조회')
  .option('--profiles <file>', '프로필 정의 파일 (JSON)')
  .action(async (options) => {
    const { listProfilesCommand } = await import('./commands/profiles');
    await listProfilesCommand(options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key, value) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`오류: ${err.message}`));
  process.exit(1);
});

// 명령어가 없으면 도움말 표시
if (process.argv.length <= 2) {
  console.log(chalk.cyan('\n  forcegen - ch-image --force 테스트 생성기\n'));
  console.log('  사용법: forcegen <명령어> [옵션]\n');
  console.log('  명령어:');
  console.log('    generate        BATS 테스트 파일 생성');
  console.log('    summary         생성될 테스트 수 요약');
  console.log('    list-profiles   프로필 목록 조회');
  console.log('    config          설정 관리');
  console.log('\n  예시:');
  console.log(chalk.gray('    forcegen generate -o test/build/61_force-auto.bats'));
  console.log(chalk.gray('    forcegen generate --stdout -p centos_7 -p alpine_316'));
  console.log(chalk.gray('    forcegen summary'));
  console.log('\n  자세한 내용: forcegen --help\n');
} else {
  // 파싱 및 실행
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`오류: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
