import { promises as fs } from 'fs';
import { dirname } from 'path';
import { EngineConfigSchema, type EngineConfig } from '@pileup-intel/contracts';
import { ErrorBoundary } from '../utils/ErrorBoundary.js';
import { PileupError } from '../utils/errors/PileupError.js';

/**
 * 把 zod 校验问题格式化为 "字段路径: 说明"
 */
function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// 配置管理器
export class ConfigManager {
  private config: EngineConfig;

  constructor(private readonly configPath: string) {
    this.config = EngineConfigSchema.parse({});
  }

  /**
   * 初始化配置管理器
   * 文件不存在时写入默认配置；文件内容不合法时抛出 PileupError
   */
  async initialize(): Promise<EngineConfig> {
    console.log(`📁 [配置管理器] 配置文件路径: ${this.configPath}`);

    const raw = await this.loadConfigFile();
    if (raw === undefined) {
      console.log('⚠️ [配置管理器] 配置文件不存在，使用默认配置');
      this.config = EngineConfigSchema.parse({});
      await this.save();
      console.log('✅ [配置管理器] 默认配置文件已创建');
      return this.getConfig();
    }

    this.config = this.validate(raw);
    console.log('✅ [配置管理器] 配置文件加载成功');
    return this.getConfig();
  }

  /**
   * 读取并解析 JSON；文件不存在返回 undefined
   */
  private async loadConfigFile(): Promise<unknown> {
    return ErrorBoundary.execute(
      {
        operationName: '读取配置文件',
        errorTransform: error => PileupError.configLoadFailed(this.configPath, error),
      },
      async () => {
        let text: string;
        try {
          text = await fs.readFile(this.configPath, 'utf-8');
        } catch (error) {
          if (isFileNotFound(error)) {
            return undefined;
          }
          throw error;
        }
        const parsed: unknown = JSON.parse(text);
        return parsed;
      }
    );
  }

  private validate(raw: unknown): EngineConfig {
    const result = EngineConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = formatIssues(result.error.issues);
      console.error(`❌ [配置管理器] 配置校验失败: ${issues.join('; ')}`);
      throw PileupError.invalidConfig(issues, this.configPath);
    }
    return result.data;
  }

  /**
   * 保存配置文件
   */
  async save(): Promise<void> {
    await fs.mkdir(dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  getConfig(): EngineConfig {
    return structuredClone(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 更新某个配置分区（校验通过后保存）
   */
  async updateConfig<K extends keyof EngineConfig>(section: K, updates: Partial<EngineConfig[K]>): Promise<EngineConfig> {
    const candidate = {
      ...this.config,
      [section]: { ...this.config[section], ...updates },
    };
    this.config = this.validate(candidate);
    await this.save();
    console.log(`💾 [配置管理器] 已更新配置分区: ${section}`);
    return this.getConfig();
  }
}
