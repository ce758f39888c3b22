import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { createProgram, parseCliArguments, parseTimeout, shouldShowHelp, type CliOptions } from '@/cli/program';

function parse(args: string[]): CliOptions {
  const program = createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  program.parse(args, { from: 'user' });
  return program.opts<CliOptions>();
}

describe('parseTimeout', () => {
  it('accepts positive seconds', () => {
    expect(parseTimeout('3')).toBe(3);
    expect(parseTimeout('1.5')).toBe(1.5);
  });

  it.each(['0', '-2', 'soon', ''])('rejects %j', (value) => {
    expect(() => parseTimeout(value)).toThrow(InvalidArgumentError);
  });
});

describe('createProgram', () => {
  it('applies defaults', () => {
    expect(parse(['--ip_input', '10.0.0.1'])).toEqual({
      ip_input: '10.0.0.1',
      timeout: 3,
      output: 'stdout',
      outputDir: '.',
      verifyTls: false,
      verbose: false,
      debug: false,
    });
  });

  it('reads every option', () => {
    const options = parse([
      '--ip_file', 'hosts.txt',
      '--timeout', '10',
      '--output', 'file',
      '--output-dir', 'records',
      '--verify-tls',
      '--debug',
    ]);

    expect(options).toMatchObject({
      ip_file: 'hosts.txt',
      timeout: 10,
      output: 'file',
      outputDir: 'records',
      verifyTls: true,
      debug: true,
    });
  });

  it('refuses a timeout that is not a positive number', () => {
    expect(() => parse(['--ip_input', '10.0.0.1', '--timeout', 'abc'])).toThrow(
      "error: option '--timeout <seconds>' argument 'abc' is invalid. Timeout must be a positive number of seconds."
    );
  });
});

describe('parseCliArguments', () => {
  const options: CliOptions = {
    ip_input: '10.0.0.0/30',
    timeout: 3,
    output: 'stdout',
    outputDir: '.',
    verifyTls: false,
    verbose: false,
    debug: false,
  };

  it('maps options and reads credentials from the environment', () => {
    expect(parseCliArguments(options, { DEVICE_SWEEP_USERNAME: 'operator', DEVICE_SWEEP_PASSWORD: 'test-secret' })).toEqual({
      ipInput: '10.0.0.0/30',
      ipFile: undefined,
      timeout: 3,
      output: 'stdout',
      outputDir: '.',
      verifyTls: false,
      username: 'operator',
      password: 'test-secret',
      verbose: false,
      debug: false,
    });
  });

  it('enables debug and verbose output from DEBUG=true', () => {
    const args = parseCliArguments(options, { DEBUG: 'true' });
    expect(args.debug).toBe(true);
    expect(args.verbose).toBe(true);
    expect(args.username).toBeUndefined();
  });
});

describe('shouldShowHelp', () => {
  it('shows usage when neither input is given', () => {
    expect(shouldShowHelp(parse([]))).toBe(true);
    expect(shouldShowHelp(parse(['--timeout', '5', '--output', 'file']))).toBe(true);
  });

  it('treats empty inputs as missing', () => {
    expect(shouldShowHelp({ ip_input: '', ip_file: '' })).toBe(true);
  });

  it('runs when either input is given', () => {
    expect(shouldShowHelp(parse(['--ip_input', '10.0.0.1']))).toBe(false);
    expect(shouldShowHelp(parse(['--ip_file', 'hosts.txt']))).toBe(false);
  });
});
