import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig, defaultConfig } from '../../../src/config/loader.js';
import { Buck2McpError } from '../../../src/shared/errors.js';
import { MAX_TIMEOUT_SECONDS } from '../../../src/execution/runner.js';
import { logger } from '../../../src/logger.js';

describe('parseConfig', () => {
  it('fills every default for an empty document', () => {
    expect(parseConfig(null)).toEqual({
      buck2: { binary: 'buck2', command_timeout_seconds: 0 },
      discovery: { build_file_name: 'BUCK', ignore_dirs: ['buck-out', '.git'] },
    });
  });

  it('keeps defaults for keys a partial section leaves out', () => {
    const config = parseConfig({ buck2: { command_timeout_seconds: 600 } });
    expect(config.buck2).toEqual({ binary: 'buck2', command_timeout_seconds: 600 });
    expect(config.discovery).toEqual(defaultConfig().discovery);
  });

  it('throws Buck2McpError for invalid values', () => {
    expect(() => parseConfig({ buck2: { command_timeout_seconds: -1 } })).toThrow(Buck2McpError);
  });

  it('accepts the largest timeout a Node timer can hold', () => {
    expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
    expect(parseConfig({ buck2: { command_timeout_seconds: MAX_TIMEOUT_SECONDS } }).buck2.command_timeout_seconds).toBe(2147483);
  });

  it('rejects timeouts that would overflow the timer', () => {
    expect(() => parseConfig({ buck2: { command_timeout_seconds: MAX_TIMEOUT_SECONDS + 1 } })).toThrow(Buck2McpError);
  });

  it('rejects fractional timeouts', () => {
    expect(() => parseConfig({ buck2: { command_timeout_seconds: 1.5 } })).toThrow(Buck2McpError);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'buck2-mcp-loader-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('uses defaults when the file does not exist', () => {
    const configPath = join(tempDir, 'config.yaml');
    const result = loadConfig(configPath, {});
    expect(result).toEqual({ config: defaultConfig(), configPath, fromFile: false });
  });

  it('reads overrides from YAML', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, 'buck2:\n  binary: /opt/buck2/bin/buck2\ndiscovery:\n  build_file_name: TARGETS\n');

    const result = loadConfig(configPath, {});

    expect(result.fromFile).toBe(true);
    expect(result.config.buck2.binary).toBe('/opt/buck2/bin/buck2');
    expect(result.config.discovery).toEqual({ build_file_name: 'TARGETS', ignore_dirs: ['buck-out', '.git'] });
  });

  it('treats an empty file as all defaults', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, '');
    expect(loadConfig(configPath, {}).config).toEqual(defaultConfig());
  });

  it('falls back to defaults when the file fails validation', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, 'buck2:\n  binary: ""\n');

    const result = loadConfig(configPath, {});

    expect(result.fromFile).toBe(false);
    expect(result.config).toEqual(defaultConfig());
  });

  it('falls back to defaults on malformed YAML and logs the error object', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, 'buck2: [unclosed\n');
    const spy = jest.spyOn(logger, 'error');
    try {
      expect(loadConfig(configPath, {}).config).toEqual(defaultConfig());
      expect(spy).toHaveBeenCalledWith({ configPath, err: expect.any(Error) }, 'Failed to load config — using defaults');
    } finally {
      spy.mockRestore();
    }
  });

  it('lets BUCK2_BINARY override the file', async () => {
    const configPath = join(tempDir, 'config.yaml');
    await writeFile(configPath, 'buck2:\n  binary: from-file\n');
    const result = loadConfig(configPath, { BUCK2_BINARY: 'from-env' });
    expect(result.config.buck2.binary).toBe('from-env');
  });

  it('resolves the path from BUCK2_MCP_CONFIG when none is given', async () => {
    const configPath = join(tempDir, 'custom.yaml');
    await writeFile(configPath, 'buck2:\n  command_timeout_seconds: 5\n');
    const result = loadConfig(undefined, { BUCK2_MCP_CONFIG: configPath });
    expect(result.configPath).toBe(configPath);
    expect(result.config.buck2.command_timeout_seconds).toBe(5);
  });
});
