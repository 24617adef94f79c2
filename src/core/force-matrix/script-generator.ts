/**
 * Force Matrix Script Generator
 * 도출 결과를 하나의 BATS 테스트 파일로 렌더링
 */

import { PREP_IMAGE_TAG, TEST_IMAGE_TAG } from './derivation';
import type {
  DerivedScenario,
  ExpectedDerivation,
  FileAssertion,
  GenerationSummary,
  HookAssertions,
  OutputAssertion,
  Scenario,
} from './types';

/**
 * 스크립트 생성 옵션
 */
export interface BatsScriptOptions {
  /** 빌드 명령어 (예: 'ch-image -v build') */
  builderCommand?: string;
  /** 테스트 이름 접두어 및 setup 가드 값 */
  builderName?: string;
  /** 빌더를 지정하는 환경 변수 */
  builderVariable?: string;
  /** 이미지 저장소 경로 환경 변수 */
  storageVariable?: string;
  /** load 할 공통 헬퍼 경로 */
  commonLoadPath?: string;
  /** 빌드 컨텍스트 */
  context?: string;
}

const INDENT = '    ';

/**
 * 시나리오 표시 이름
 */
export function scenarioLabel(scenario: Scenario): string {
  const force = scenario.forced ? 'with --force' : 'w/o --force';
  const preprep = scenario.preprep ? 'preprep' : 'no preprep';
  return `${scenario.profile.id}, ${scenario.category}, ${force}, ${preprep}`;
}

/**
 * 큰따옴표 안에서 특수 문자 이스케이프
 */
export function escapeDoubleQuoted(value: string): string {
  return value.replace(/[\\"$`]/g, (ch) => `\\${ch}`);
}

/**
 * 작은따옴표 인용
 */
export function singleQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * BATS 스크립트 생성기
 */
export class BatsScriptGenerator {
  private defaultOptions: Required<BatsScriptOptions> = {
    builderCommand: 'ch-image -v build',
    builderName: 'ch-image',
    builderVariable: 'CH_TEST_BUILDER',
    storageVariable: 'CH_IMAGE_STORAGE',
    commonLoadPath: '../common',
    context: '.',
  };

  /**
   * 전체 스크립트 생성
   */
  generate(pairs: Iterable<DerivedScenario>, options: BatsScriptOptions = {}): string {
    const opts = { ...this.defaultOptions, ...options };
    const lines: string[] = [];

    this.appendPreamble(lines, opts);

    for (const { scenario, derivation } of pairs) {
      lines.push('');
      if (derivation.skipped) {
        lines.push(`# skip: ${scenarioLabel(scenario)}: ${derivation.reason}`);
      } else {
        this.appendTest(lines, scenario, derivation, opts);
      }
    }

    return lines.join('\n') + '\n';
  }

  /**
   * 생성 요약
   */
  summarize(pairs: Iterable<DerivedScenario>): GenerationSummary {
    const summary: GenerationSummary = {
      total: 0,
      emitted: 0,
      skipped: 0,
      byScope: { standard: 0, full: 0 },
      skipReasons: {},
    };

    for (const { derivation } of pairs) {
      summary.total++;
      if (derivation.skipped) {
        summary.skipped++;
        summary.skipReasons[derivation.reason] = (summary.skipReasons[derivation.reason] ?? 0) + 1;
      } else {
        summary.emitted++;
        summary.byScope[derivation.scope]++;
      }
    }

    return summary;
  }

  private appendPreamble(lines: string[], opts: Required<BatsScriptOptions>): void {
    lines.push('# NOTE: This file is generated by forcegen. Do not modify.');
    lines.push('');
    lines.push(`load ${opts.commonLoadPath}`);
    lines.push('');
    lines.push('setup () {');
    lines.push(
      `${INDENT}[[ $${opts.builderVariable} = ${opts.builderName} ]] || skip '${opts.builderName} only'`
    );
    lines.push('}');
  }

  private appendTest(
    lines: string[],
    scenario: Scenario,
    derivation: ExpectedDerivation,
    opts: Required<BatsScriptOptions>
  ): void {
    const { profile } = scenario;
    const name = escapeDoubleQuoted(`${opts.builderName} --force: ${scenarioLabel(scenario)}`);

    lines.push(`@test "${name}" {`);
    lines.push(`${INDENT}scope ${derivation.scope}`);
    for (const arch of profile.archExcludes) {
      lines.push(`${INDENT}arch_exclude ${arch}`);
    }

    // 빌드 1: 사전 준비 이미지
    let base = profile.baseImage;
    if (scenario.preprep && profile.prepCommand !== undefined) {
      lines.push(`${INDENT}# build 1: preparatory image`);
      this.appendBuild(lines, opts, false, PREP_IMAGE_TAG, profile.baseImage, profile.prepCommand);
      lines.push(`${INDENT}[[ $status -eq 0 ]]`);
      if (derivation.prepHook) {
        this.appendHook(lines, derivation.prepHook, opts);
      }
      base = PREP_IMAGE_TAG;
    }

    // 빌드 2: 테스트 대상
    lines.push(`${INDENT}# build 2: image under test`);
    this.appendBuild(lines, opts, scenario.forced, TEST_IMAGE_TAG, base, derivation.command);
    lines.push(`${INDENT}[[ $status -eq ${derivation.expectedStatus} ]]`);
    this.appendOutputs(lines, derivation.outputs);
    if (derivation.finalHook) {
      this.appendHook(lines, derivation.finalHook, opts);
    }

    lines.push('}');
  }

  private appendBuild(
    lines: string[],
    opts: Required<BatsScriptOptions>,
    forced: boolean,
    tag: string,
    from: string,
    command: string
  ): void {
    const force = forced ? ' --force' : '';
    // heredoc 본문과 종료 표식은 들여쓰기 없이
    lines.push(`${INDENT}run ${opts.builderCommand}${force} -t ${tag} -f - ${opts.context} << 'EOF'`);
    lines.push(`FROM ${from}`);
    lines.push(`RUN ${command}`);
    lines.push('EOF');
    lines.push(`${INDENT}echo "$output"`);
  }

  private appendOutputs(lines: string[], outputs: readonly OutputAssertion[]): void {
    for (const output of outputs) {
      const flag = output.regex ? '-Eq' : '-Fq';
      const grep = `echo "$output" | grep ${flag} -- "${escapeDoubleQuoted(output.pattern)}"`;
      lines.push(output.invert ? `${INDENT}( ! ${grep} )` : `${INDENT}${grep}`);
    }
  }

  private appendFiles(
    lines: string[],
    files: readonly FileAssertion[],
    opts: Required<BatsScriptOptions>
  ): void {
    for (const file of files) {
      const filePath = `"$${opts.storageVariable}"/img/${file.image}/${file.path}`;
      const pattern = singleQuote(file.pattern);
      if (file.invert) {
        lines.push(`${INDENT}( ! grep -Eqs ${pattern} ${filePath} )`);
      } else {
        lines.push(`${INDENT}ls -lh ${filePath}`);
        lines.push(`${INDENT}grep -Eq ${pattern} ${filePath}`);
      }
    }
  }

  private appendHook(
    lines: string[],
    hook: HookAssertions,
    opts: Required<BatsScriptOptions>
  ): void {
    lines.push(`${INDENT}# ${hook.comment}`);
    this.appendOutputs(lines, hook.outputs);
    this.appendFiles(lines, hook.files, opts);
  }
}

// 싱글톤 인스턴스
let generatorInstance: BatsScriptGenerator | null = null;

export function getBatsScriptGenerator(): BatsScriptGenerator {
  if (!generatorInstance) {
    generatorInstance = new BatsScriptGenerator();
  }
  return generatorInstance;
}
