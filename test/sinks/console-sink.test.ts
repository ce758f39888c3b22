import { describe, it, expect, vi } from 'vitest';
import { ConsoleSink, formatConsoleRecord } from '@/sinks/console-sink';
import { createSink } from '@/sinks/factory';
import { FileSink } from '@/sinks/file-sink';
import { OutputMode } from '@/models/config';
import { DEFAULT_ENDPOINTS } from '@/scanners/endpoints';

const endpoint = DEFAULT_ENDPOINTS[1];

describe('ConsoleSink', () => {
  it('frames the payload with the host and port', () => {
    expect(formatConsoleRecord('10.0.0.1', { hw: 'ok' }, endpoint)).toEqual({
      title: '10.0.0.1 (port 443)',
      body: '{\n  "hw": "ok"\n}',
    });
  });

  it('writes the title and then the indented body', async () => {
    const writeTitle = vi.fn();
    const writeBody = vi.fn();
    const sink = new ConsoleSink(writeTitle, writeBody);

    const result = await sink.emit('10.0.0.1', { hw: 'ok' }, endpoint);

    expect(writeTitle).toHaveBeenCalledWith('10.0.0.1 (port 443)');
    expect(writeBody).toHaveBeenCalledWith('{\n  "hw": "ok"\n}');
    expect(result).toEqual({ host: '10.0.0.1', location: 'stdout' });
  });

  it('prints through the logger by default', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await new ConsoleSink().emit('10.0.0.1', { hw: 'ok' }, endpoint);

    expect(log).toHaveBeenCalledWith('── 10.0.0.1 (port 443) ──');
    expect(log).toHaveBeenCalledWith('{\n  "hw": "ok"\n}');
  });
});

describe('createSink', () => {
  it('picks a sink for each output mode', () => {
    expect(createSink(OutputMode.FILE, '.')).toBeInstanceOf(FileSink);
    expect(createSink(OutputMode.STDOUT, '.')).toBeInstanceOf(ConsoleSink);
  });
});
