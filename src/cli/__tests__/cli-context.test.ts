/**
 * Tests for the CLI context adapter.
 */

import { describe, expect, it } from '@jest/globals';
import {
  colorize,
  createCliContext,
  createCliContextWithConfig,
  createDebugLogger,
  createOutput,
  type OutputStream,
} from '../cli-context.js';
import { createTestConfig, MockEnvReader, MockFileSystem } from '../../../tests/fixtures/index.js';

class CaptureStream implements OutputStream {
  chunks: string[] = [];

  constructor(public isTTY = false) {}

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

describe('colorize', () => {
  it('leaves text alone when not writing to a terminal', () => {
    expect(colorize('hi', '\x1b[32m', new CaptureStream(false))).toBe('hi');
  });

  it('wraps text in the color on a terminal', () => {
    expect(colorize('hi', '\x1b[32m', new CaptureStream(true))).toBe('\x1b[32mhi\x1b[0m');
  });

  it('leaves text alone without a color', () => {
    expect(colorize('hi', undefined, new CaptureStream(true))).toBe('hi');
  });
});

describe('createOutput', () => {
  it('writes errors to stderr and everything else to stdout', () => {
    const stdout = new CaptureStream();
    const stderr = new CaptureStream();
    const output = createOutput(stdout, stderr);

    output('report line');
    output('done', 'success');
    output('bad root', 'error');

    expect(stdout.chunks).toEqual(['report line\n', 'done\n']);
    expect(stderr.chunks).toEqual(['bad root\n']);
  });

  it('never colors untyped output', () => {
    const stdout = new CaptureStream(true);
    createOutput(stdout, new CaptureStream(true))('{"issues":[]}');
    expect(stdout.chunks).toEqual(['{"issues":[]}\n']);
  });

  it('colors typed output on a terminal', () => {
    const stdout = new CaptureStream(true);
    createOutput(stdout, new CaptureStream(true))('careful', 'warning');
    expect(stdout.chunks).toEqual(['\x1b[33mcareful\x1b[0m\n']);
  });
});

describe('createOutput log levels', () => {
  function writeAll(logLevel: 'info' | 'warn' | 'error'): { out: string[]; err: string[] } {
    const stdout = new CaptureStream();
    const stderr = new CaptureStream();
    const output = createOutput(stdout, stderr, logLevel);
    output('report line');
    output('hint', 'info');
    output('done', 'success');
    output('careful', 'warning');
    output('bad root', 'error');
    return { out: stdout.chunks, err: stderr.chunks };
  }

  it('writes everything at info', () => {
    expect(writeAll('info')).toEqual({
      out: ['report line\n', 'hint\n', 'done\n', 'careful\n'],
      err: ['bad root\n'],
    });
  });

  it('drops info and success output at warn', () => {
    expect(writeAll('warn')).toEqual({
      out: ['report line\n', 'careful\n'],
      err: ['bad root\n'],
    });
  });

  it('keeps only report content and errors at error', () => {
    expect(writeAll('error')).toEqual({
      out: ['report line\n'],
      err: ['bad root\n'],
    });
  });
});

describe('createDebugLogger', () => {
  it('writes prefixed lines with JSON data', () => {
    const stderr = new CaptureStream();
    const debug = createDebugLogger(stderr);
    debug('Scan complete', { packages: 2 });
    debug('Done');
    expect(stderr.chunks).toEqual(['[debug] Scan complete {"packages":2}\n', '[debug] Done\n']);
  });
});

describe('createCliContext', () => {
  function managerOptions(
    env: Record<string, string> = {}
  ): { fileSystem: MockFileSystem; envReader: MockEnvReader } {
    return { fileSystem: new MockFileSystem(), envReader: new MockEnvReader(env) };
  }

  it('loads configuration into the context', async () => {
    const response = await createCliContext(
      {},
      { configManager: managerOptions({ SKILLCHECK_FORMAT: 'json' }) }
    );
    expect(response.success).toBe(true);
    if (response.success) {
      expect(response.result.config.format).toBe('json');
      expect(response.result.onDebug).toBeUndefined();
    }
  });

  it('maps a missing --config file to a usage error', async () => {
    const response = await createCliContext(
      { config: '/missing.json' },
      { configManager: managerOptions() }
    );
    expect(response).toEqual({
      success: false,
      error: 'USAGE_ERROR',
      message: 'Config file not found: /missing.json',
    });
  });

  it('maps invalid configuration to a config error', async () => {
    const options = managerOptions();
    options.fileSystem.setFile('/project/.skillcheck/settings.json', '{');
    const response = await createCliContext({}, { configManager: options });
    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error).toBe('CONFIG_ERROR');
    }
  });

  it('logs config layers under --verbose', async () => {
    const stderr = new CaptureStream();
    const response = await createCliContext(
      { verbose: true },
      { stderr, configManager: managerOptions() }
    );
    expect(response.success).toBe(true);
    expect(stderr.chunks).toEqual([
      '[debug] Config layer loaded {"source":"defaults"}\n',
      '[debug] Config layer loaded {"source":"merged"}\n',
    ]);
  });
});

describe('createCliContextWithConfig', () => {
  it('enables debug output for logLevel debug', () => {
    const context = createCliContextWithConfig(createTestConfig({ logLevel: 'debug' }));
    expect(context.onDebug).toBeDefined();
  });

  it('leaves debug output off by default', () => {
    const context = createCliContextWithConfig(createTestConfig(), {});
    expect(context.onDebug).toBeUndefined();
  });

  it('applies the configured log level to output', () => {
    const stdout = new CaptureStream();
    const context = createCliContextWithConfig(
      createTestConfig({ logLevel: 'warn' }),
      {},
      { stdout, stderr: new CaptureStream() }
    );

    context.onOutput('hint', 'info');
    context.onOutput('Summary: 0 errors, 0 warnings across 1 skill');

    expect(stdout.chunks).toEqual(['Summary: 0 errors, 0 warnings across 1 skill\n']);
  });
});
