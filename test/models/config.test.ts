import { describe, it, expect } from 'vitest';
import { ConfigBuilder, ConfigValidationError, OutputMode } from '@/models/config';

describe('ConfigBuilder', () => {
  it('fills defaults around a single input', () => {
    expect(ConfigBuilder.fromCliArgs({ ipInput: ' 10.0.0.0/24 ' })).toEqual({
      ipInput: '10.0.0.0/24',
      ipFile: undefined,
      timeout: 3,
      username: 'admin',
      password: 'admin',
      verifyTls: false,
      output: OutputMode.STDOUT,
      outputDir: '.',
      verbose: undefined,
      debug: undefined,
    });
  });

  it('requires at least one input', () => {
    expect(() => ConfigBuilder.fromCliArgs({ timeout: 5 })).toThrow(
      new ConfigValidationError('At least one of --ip_input or --ip_file is required')
    );
  });

  it('accepts both inputs together', () => {
    const config = ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', ipFile: 'hosts.txt', output: 'file' });
    expect(config.ipInput).toBe('10.0.0.1');
    expect(config.ipFile).toBe('hosts.txt');
    expect(config.output).toBe(OutputMode.FILE);
  });

  it('rejects an unknown output mode', () => {
    expect(() => ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', output: 'yaml' })).toThrow(
      'Invalid output: yaml. Must be one of: file, stdout'
    );
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects a timeout of %s', (timeout) => {
    expect(() => ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', timeout })).toThrow(ConfigValidationError);
  });

  it('keeps fractional timeouts', () => {
    expect(ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', timeout: 0.5 }).timeout).toBe(0.5);
  });

  it('rejects a blank address input', () => {
    expect(() => new ConfigBuilder().setIpInput('   ')).toThrow('IP input cannot be empty');
  });

  it('falls back to the default user when only a password is given', () => {
    const config = ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', password: 'test-secret' });
    expect(config.username).toBe('admin');
    expect(config.password).toBe('test-secret');
  });

  it('allows an empty username', () => {
    const config = ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', username: '' });
    expect(config.username).toBe('');
    expect(config.password).toBe('admin');
  });

  it('turns on verbose output in debug mode', () => {
    expect(ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', debug: true }).verbose).toBe(true);
    expect(ConfigBuilder.fromCliArgs({ ipInput: '10.0.0.1', debug: true, verbose: false }).verbose).toBe(false);
  });
});
