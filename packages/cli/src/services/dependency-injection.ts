import { config as loadDotenv } from 'dotenv';
import {
  BranchAllocator,
  Config,
  ContentLocator,
  HostingPlatform,
  ItemSubmission,
  Logger,
  Submission,
} from '@catalog-submissions/core';
import { GitHubHostingPlatform, createOctokit } from '@catalog-submissions/core/github';

/**
 * Dependency Injection Service for the catalog-submissions CLI
 *
 * Builds every core service once per process:
 * .env file, then config, then Octokit, then the hosting platform and services.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private config: Config.SubmissionConfig | null = null;
  private hostingPlatform: HostingPlatform.IHostingPlatform | null = null;
  private itemSubmissionService: ItemSubmission.IItemSubmissionService | null = null;
  private logLevel: Logger.LogLevel = 'warn';

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
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Level of the logger handed to services built after this call
   */
  setLogLevel(level: Logger.LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Loads `.env` (without overriding the real environment) and validates it.
   * @throws ConfigError when a variable is missing or invalid
   */
  getConfig(): Config.SubmissionConfig {
    if (this.config) {
      return this.config;
    }

    loadDotenv();
    this.config = Config.loadSubmissionConfig(process.env);
    return this.config;
  }

  async getHostingPlatform(): Promise<HostingPlatform.IHostingPlatform> {
    if (this.hostingPlatform) {
      return this.hostingPlatform;
    }

    const config = this.getConfig();
    const octokit = createOctokit({
      token: config.token,
      apiBaseUrl: config.apiBaseUrl,
      requestTimeoutMs: config.requestTimeoutMs,
    });

    this.hostingPlatform = new GitHubHostingPlatform(
      { owner: config.owner, repo: config.repo, mainBranch: config.mainBranch },
      octokit,
    );
    return this.hostingPlatform;
  }

  /**
   * Creates and returns ItemSubmissionService with all required dependencies
   */
  async getItemSubmissionService(): Promise<ItemSubmission.IItemSubmissionService> {
    if (this.itemSubmissionService) {
      return this.itemSubmissionService;
    }

    const config = this.getConfig();
    const platform = await this.getHostingPlatform();
    const logger = Logger.createLogger('[catalog] ', this.logLevel);

    const orchestrator = new Submission.SubmissionOrchestrator({
      platform,
      allocator: new BranchAllocator.BranchAllocator({
        platform,
        maxRetries: config.branchAllocationMaxRetries,
        logger,
      }),
      locator: new ContentLocator.ContentLocator({ platform }),
      logger,
    });

    this.itemSubmissionService = new ItemSubmission.ItemSubmissionService({
      orchestrator,
      lister: new Submission.SubmissionLister({ platform, logger }),
      logger,
    });
    return this.itemSubmissionService;
  }
}
