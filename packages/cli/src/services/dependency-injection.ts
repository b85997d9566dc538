import { Batch, Config, Logger, Process, Resolver } from '@modreq/core';
import { FsConfigStore, FsWorkspaceManager, createSpawnExecCommand, locateExecutable } from '@modreq/core/fs';

/**
 * Dependency Injection Service for the modreq CLI
 *
 * Builds the resolution pipeline from the effective configuration.
 * Commands ask this service for collaborators instead of constructing
 * them, so tests can replace the whole service with a mock.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private config: Config.ModreqConfig | null = null;
  private execCommand: Process.ExecCommand | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * ConfigManager over modreq.config.json (or MODREQ_CONFIG)
   */
  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = new Config.ConfigManager(FsConfigStore.fromEnvironment());
    }
    return this.configManager;
  }

  /**
   * Effective configuration, resolved once per process
   *
   * @throws ConfigError on an invalid MODREQ_TRANSPORTS
   */
  async getConfig(): Promise<Config.ModreqConfig> {
    if (!this.config) {
      this.config = await this.getConfigManager().resolveConfig(process.env);
    }
    return this.config;
  }

  getExecCommand(): Process.ExecCommand {
    if (!this.execCommand) {
      this.execCommand = createSpawnExecCommand();
    }
    return this.execCommand;
  }

  /**
   * Absolute path of the configured git client
   *
   * @throws GitNotFoundError when it is not installed
   */
  async locateGit(): Promise<string> {
    const config = await this.getConfig();
    return locateExecutable(config.gitBinary);
  }

  /**
   * Batch resolver running `gitBinary`, with --verbose diagnostics on stdout
   */
  async getBatchResolver(gitBinary: string, verbose: boolean): Promise<Batch.BatchResolver> {
    const config = await this.getConfig();

    const resolver = new Resolver.RequireResolver({
      execCommand: this.getExecCommand(),
      workspaces: new FsWorkspaceManager({
        tempDir: config.tempDir,
        prefix: config.workspacePrefix,
      }),
      gitBinary,
      transports: config.transports,
      logger: Logger.createVerboseLogger(verbose),
    });

    return new Batch.BatchResolver(resolver);
  }

  static reset(): void {
    DependencyInjectionService.instance = null;
  }
}
