import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

// 설정 인터페이스 정의
export interface Config {
  // 생성 스크립트 설정
  builderCommand: string;
  builderName: string;
  builderVariable: string;
  storageVariable: string;
  commonLoadPath: string;

  // 입출력 경로
  outputPath: string;
  profilesPath?: string; // 없으면 내장 카탈로그 사용

  // 기타 설정
  logLevel: string;
}

// 기본 설정값
const DEFAULT_CONFIG: Config = {
  builderCommand: 'ch-image -v build',
  builderName: 'ch-image',
  builderVariable: 'CH_TEST_BUILDER',
  storageVariable: 'CH_IMAGE_STORAGE',
  commonLoadPath: '../common',
  outputPath: 'build/61_force-auto.bats',
  logLevel: 'info',
};

const CONFIG_KEYS: readonly (keyof Config)[] = [
  'builderCommand',
  'builderName',
  'builderVariable',
  'storageVariable',
  'commonLoadPath',
  'outputPath',
  'profilesPath',
  'logLevel',
];

export function isConfigKey(key: string): key is keyof Config {
  return CONFIG_KEYS.some((k) => k === key);
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(configDir: string = path.join(os.homedir(), '.forcegen')) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  getConfigDir(): string {
    return this.configDir;
  }

  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다.
   * 저장된 값 중 문자열인 알려진 키만 기본값 위에 병합
   */
  getConfig(): Config {
    const config: Config = { ...DEFAULT_CONFIG };
    if (!fs.pathExistsSync(this.configPath)) {
      return config;
    }

    const raw: unknown = fs.readJsonSync(this.configPath);
    if (typeof raw !== 'object' || raw === null) {
      throw new Error(`잘못된 설정 파일: ${this.configPath}`);
    }

    for (const [key, value] of Object.entries(raw)) {
      if (isConfigKey(key) && typeof value === 'string') {
        config[key] = value;
      }
    }
    return config;
  }

  /**
   * 설정값을 동기적으로 설정합니다.
   */
  set(key: string, value: string): void {
    if (!isConfigKey(key)) {
      throw new Error(`알 수 없는 설정 키: ${key}`);
    }

    fs.ensureDirSync(this.configDir);
    const config = this.getConfig();
    config[key] = value;
    fs.writeJsonSync(this.configPath, config, { spaces: 2 });
  }

  /**
   * 설정을 동기적으로 초기화합니다.
   */
  reset(): void {
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager(process.env.FORCEGEN_CONFIG_DIR || undefined);
  }
  return configManagerInstance;
}
