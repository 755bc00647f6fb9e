import { loadSubmissionConfig } from './config_manager';
import { ConfigError } from '../errors';

const baseEnv = {
  GITHUB_TOKEN: 'test-secret',
  GITHUB_REPO_ID: 'test-org/catalog',
};

function configErrorOf(env: Record<string, string | undefined>): ConfigError {
  try {
    loadSubmissionConfig(env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected ConfigError');
}

describe('loadSubmissionConfig', () => {
  it('should apply defaults to a minimal environment', () => {
    expect(loadSubmissionConfig(baseEnv)).toEqual({
      token: 'test-secret',
      owner: 'test-org',
      repo: 'catalog',
      mainBranch: 'main',
      apiBaseUrl: 'https://api.github.com',
      requestTimeoutMs: 10000,
      branchAllocationMaxRetries: 15,
    });
  });

  it('should read every variable', () => {
    const config = loadSubmissionConfig({
      ...baseEnv,
      GITHUB_MAIN_BRANCH: 'trunk',
      GITHUB_API_BASE_URL: 'https://ghe.example.test/api/v3',
      GITHUB_REQUEST_TIMEOUT_MS: '2500',
      BRANCH_ALLOCATION_MAX_RETRIES: '0',
    });

    expect(config).toMatchObject({
      mainBranch: 'trunk',
      apiBaseUrl: 'https://ghe.example.test/api/v3',
      requestTimeoutMs: 2500,
      branchAllocationMaxRetries: 0,
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadSubmissionConfig({ ...baseEnv, GITHUB_MAIN_BRANCH: '  ', GITHUB_REQUEST_TIMEOUT_MS: '' });

    expect(config.mainBranch).toBe('main');
    expect(config.requestTimeoutMs).toBe(10000);
  });

  it('should report every missing required variable', () => {
    const error = configErrorOf({});

    expect(error.fields).toEqual(expect.arrayContaining(['GITHUB_TOKEN', 'GITHUB_REPO_ID']));
    expect(error.fields).toHaveLength(2);
    expect(error.message).toContain("GITHUB_TOKEN: must have required property 'token'");
    expect(error.message).toContain("GITHUB_REPO_ID: must have required property 'repoId'");
  });

  it('should reject a repository id without an owner', () => {
    const error = configErrorOf({ ...baseEnv, GITHUB_REPO_ID: 'catalog' });

    expect(error.fields).toEqual(['GITHUB_REPO_ID']);
  });

  it('should reject a non-numeric timeout', () => {
    const error = configErrorOf({ ...baseEnv, GITHUB_REQUEST_TIMEOUT_MS: 'soon' });

    expect(error.fields).toEqual(['GITHUB_REQUEST_TIMEOUT_MS']);
    expect(error.message).toBe('Invalid configuration: GITHUB_REQUEST_TIMEOUT_MS: must be integer');
  });

  it('should reject a zero timeout', () => {
    const error = configErrorOf({ ...baseEnv, GITHUB_REQUEST_TIMEOUT_MS: '0' });

    expect(error.message).toBe('Invalid configuration: GITHUB_REQUEST_TIMEOUT_MS: must be >= 1');
  });

  it('should bound the branch allocation retries', () => {
    const error = configErrorOf({ ...baseEnv, BRANCH_ALLOCATION_MAX_RETRIES: '101' });

    expect(error.message).toBe('Invalid configuration: BRANCH_ALLOCATION_MAX_RETRIES: must be <= 100');
  });

  it('should require the API base URL to be a URI', () => {
    const error = configErrorOf({ ...baseEnv, GITHUB_API_BASE_URL: 'not a url' });

    expect(error.fields).toEqual(['GITHUB_API_BASE_URL']);
    expect(error.message).toBe('Invalid configuration: GITHUB_API_BASE_URL: must match format "uri"');
  });
});
