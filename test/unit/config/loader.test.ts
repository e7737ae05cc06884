import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from '../../../src/config/loader.js';
import { DispatchError, DispatchErrorCode } from '../../../src/errors.js';

describe('parseConfig', () => {
  it('fills unset keys from the defaults', () => {
    const config = parseConfig('diagnostics:\n  benign_prefixes: ["[W::"]\n');
    expect(config).toEqual({
      samtools: { binary: 'samtools', cwd: null },
      diagnostics: { benign_prefixes: ['[W::'], replace_defaults: false },
    });
  });

  it('treats an empty document as all defaults', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('samtools:\n  binary: 42\n', 'test.yaml')).toThrow(
      'Invalid config in test.yaml: samtools.binary: Expected string, received number',
    );
  });

  it('rejects malformed YAML with INVALID_CONFIG', () => {
    let caught: unknown;
    try {
      parseConfig('samtools: [unclosed', 'bad.yaml');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DispatchError);
    expect(caught).toMatchObject({ code: DispatchErrorCode.INVALID_CONFIG, context: { path: 'bad.yaml' } });
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n', 'list.yaml')).toThrow('Config in list.yaml must be a mapping');
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'samtools-dispatch-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults without creating a file when none exists', async () => {
    const configPath = path.join(tmpDir, 'missing.yaml');
    const result = loadConfig(configPath, {});

    expect(result).toEqual({ config: DEFAULT_CONFIG, configPath, fromFile: false });
    await expect(fs.access(configPath)).rejects.toThrow();
  });

  it('reads the file given explicitly', async () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(configPath, 'samtools:\n  binary: /opt/samtools/bin/samtools\n  cwd: /data\n');

    const result = loadConfig(configPath, {});
    expect(result.fromFile).toBe(true);
    expect(result.config.samtools).toEqual({ binary: '/opt/samtools/bin/samtools', cwd: '/data' });
  });

  it('takes the path from SAMTOOLS_DISPATCH_CONFIG and the binary from SAMTOOLS_BINARY', async () => {
    const configPath = path.join(tmpDir, 'env.yaml');
    await fs.writeFile(configPath, 'samtools:\n  binary: from-file\n');

    const result = loadConfig(undefined, { SAMTOOLS_DISPATCH_CONFIG: configPath, SAMTOOLS_BINARY: 'from-env' });
    expect(result.configPath).toBe(configPath);
    expect(result.config.samtools.binary).toBe('from-env');
  });
});
