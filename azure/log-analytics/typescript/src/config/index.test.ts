import { describe, it, expect } from 'vitest';
import {
  API_VERSION,
  DEFAULT_INGESTION_HOST,
  DEFAULT_RETRY_CONFIG,
  LogAnalyticsConfig,
  buildIngestionUrl,
} from './index.js';
import { ConfigurationError } from '../errors.js';

const VALID = {
  workspaceId: 'ws-1',
  workspaceKey: 'dGVzdC1zZWNyZXQ=',
  logType: 'AppEvents',
};

function codeOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('LogAnalyticsConfig.from', () => {
  it('should fill defaults', () => {
    const config = LogAnalyticsConfig.from(VALID);

    expect(config.metadata).toEqual({});
    expect(config.ingestionHost).toBe(DEFAULT_INGESTION_HOST);
    expect(config.apiVersion).toBe(API_VERSION);
    expect(config.retry).toEqual(DEFAULT_RETRY_CONFIG);
  });

  it('should merge partial retry settings', () => {
    const config = LogAnalyticsConfig.from({ ...VALID, retry: { maxAttempts: 5 } });

    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.initialDelayMs).toBe(15000);
  });

  it('should name the offending field in the error code', () => {
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, workspaceId: '' }))).toBe(
      'Configuration.InvalidWorkspaceId'
    );
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, workspaceId: 'ws.evil.com/x' }))).toBe(
      'Configuration.InvalidWorkspaceId'
    );
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, workspaceKey: '' }))).toBe(
      'Configuration.InvalidWorkspaceKey'
    );
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, logType: 'App-Events' }))).toBe(
      'Configuration.InvalidLogType'
    );
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, logType: 'a'.repeat(101) }))).toBe(
      'Configuration.InvalidLogType'
    );
    expect(codeOf(() => LogAnalyticsConfig.from({ ...VALID, retry: { multiplier: 0 } }))).toBe(
      'Configuration.InvalidConfig'
    );
  });
});

describe('LogAnalyticsConfig.builder', () => {
  it('should merge metadata across calls', () => {
    const config = LogAnalyticsConfig.builder()
      .workspaceId(VALID.workspaceId)
      .workspaceKey(VALID.workspaceKey)
      .logType(VALID.logType)
      .metadata({ host: 'api-1' })
      .metadata({ region: 'westeurope' })
      .retry({ initialDelayMs: 1000 })
      .build();

    expect(config.metadata).toEqual({ host: 'api-1', region: 'westeurope' });
    expect(config.retry.initialDelayMs).toBe(1000);
  });

  it('should refuse to build without a workspace', () => {
    expect(() => LogAnalyticsConfig.builder().build()).toThrow(ConfigurationError);
  });
});

describe('LogAnalyticsConfig.fromEnv', () => {
  it('should read the workspace and metadata', () => {
    const config = LogAnalyticsConfig.fromEnv({
      AZURE_LOG_ANALYTICS_WORKSPACE_ID: 'ws-1',
      AZURE_LOG_ANALYTICS_WORKSPACE_KEY: 'dGVzdC1zZWNyZXQ=',
      AZURE_LOG_ANALYTICS_LOG_TYPE: 'AppEvents',
      AZURE_LOG_ANALYTICS_METADATA: '{"host":"api-1"}',
      AZURE_LOG_ANALYTICS_MAX_RETRIES: '2',
      AZURE_LOG_ANALYTICS_RETRY_DELAY_MS: '500',
    });

    expect(config.workspaceId).toBe('ws-1');
    expect(config.metadata).toEqual({ host: 'api-1' });
    expect(config.retry.maxAttempts).toBe(2);
    expect(config.retry.initialDelayMs).toBe(500);
  });

  it('should reject metadata that is not a string map', () => {
    const env = {
      AZURE_LOG_ANALYTICS_WORKSPACE_ID: 'ws-1',
      AZURE_LOG_ANALYTICS_WORKSPACE_KEY: 'dGVzdC1zZWNyZXQ=',
      AZURE_LOG_ANALYTICS_LOG_TYPE: 'AppEvents',
    };

    expect(codeOf(() => LogAnalyticsConfig.fromEnv({ ...env, AZURE_LOG_ANALYTICS_METADATA: '{"n":1}' }))).toBe(
      'Configuration.InvalidMetadata'
    );
    expect(codeOf(() => LogAnalyticsConfig.fromEnv({ ...env, AZURE_LOG_ANALYTICS_METADATA: '{' }))).toBe(
      'Configuration.InvalidMetadata'
    );
  });

  it('should reject a non-numeric retry count', () => {
    expect(
      codeOf(() =>
        LogAnalyticsConfig.fromEnv({
          AZURE_LOG_ANALYTICS_WORKSPACE_ID: 'ws-1',
          AZURE_LOG_ANALYTICS_WORKSPACE_KEY: 'dGVzdC1zZWNyZXQ=',
          AZURE_LOG_ANALYTICS_LOG_TYPE: 'AppEvents',
          AZURE_LOG_ANALYTICS_MAX_RETRIES: 'many',
        })
      )
    ).toBe('Configuration.InvalidConfig');
  });
});

describe('buildIngestionUrl', () => {
  it('should place the workspace in the host', () => {
    expect(buildIngestionUrl(LogAnalyticsConfig.from(VALID))).toBe(
      'https://ws-1.ods.opinsights.azure.com/api/logs?api-version=2016-04-01'
    );
  });
});
