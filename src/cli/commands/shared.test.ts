import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { Config } from '../../core/config';
import { ProfileConfigError } from '../../core/force-matrix';
import { resolveRegistry, scriptOptionsFromConfig } from './shared';
import { profileRow } from './profiles';

const config: Config = {
  builderCommand: 'ch-image -v build',
  builderName: 'ch-image',
  builderVariable: 'CH_TEST_BUILDER',
  storageVariable: 'CH_IMAGE_STORAGE',
  commonLoadPath: '../common',
  outputPath: 'build/61_force-auto.bats',
  logLevel: 'info',
};

describe('resolveRegistry', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'forcegen-cli-'));
  });

  afterEach(() => {
    fs.removeSync(tmpDir);
  });

  it('옵션이 없으면 내장 카탈로그', () => {
    expect(resolveRegistry({}, config).size).toBe(14);
  });

  it('프로필 선택', () => {
    const registry = resolveRegistry({ profile: ['alpine_316', 'centos_7'] }, config);
    expect(registry.list().map((p) => p.id)).toEqual(['centos_7', 'alpine_316']);
  });

  it('--profiles 파일이 설정의 profilesPath보다 우선', () => {
    const fromOption = path.join(tmpDir, 'option.json');
    const fromConfig = path.join(tmpDir, 'config.json');
    fs.writeJsonSync(fromOption, { profiles: [{ id: 'opt', baseImage: 'alpine:3.17', category: 'alpine' }] });
    fs.writeJsonSync(fromConfig, { profiles: [{ id: 'cfg', baseImage: 'alpine:3.18', category: 'alpine' }] });

    const withConfig = { ...config, profilesPath: fromConfig };
    expect(resolveRegistry({}, withConfig).list().map((p) => p.id)).toEqual(['cfg']);
    expect(resolveRegistry({ profiles: fromOption }, withConfig).list().map((p) => p.id)).toEqual(['opt']);
  });

  it('없는 프로필 선택은 설정 오류', () => {
    expect(() => resolveRegistry({ profile: ['gentoo'] }, config)).toThrow(ProfileConfigError);
  });
});

describe('scriptOptionsFromConfig', () => {
  it('설정에서 스크립트 옵션 추출', () => {
    expect(scriptOptionsFromConfig({ ...config, builderCommand: 'podman build' })).toEqual({
      builderCommand: 'podman build',
      builderName: 'ch-image',
      builderVariable: 'CH_TEST_BUILDER',
      storageVariable: 'CH_IMAGE_STORAGE',
      commonLoadPath: '../common',
    });
  });
});

describe('profileRow', () => {
  it('프로필 표 행', () => {
    const registry = resolveRegistry({ profile: ['centos_7', 'alpine_315'] }, config);
    const [centos, alpine] = registry.list();

    expect(profileRow(centos)).toEqual([
      'centos_7',
      'centos:7',
      'rhel7',
      'standard',
      '-',
      'yum install -y epel-release',
      'epel',
    ]);
    expect(profileRow(alpine)).toEqual(['alpine_315', 'alpine:3.15', 'alpine', 'full', '-', '-', '-']);
  });
});
