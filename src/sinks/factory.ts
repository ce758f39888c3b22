import type { IResultSink } from '@/interfaces/sink';
import { OutputMode } from '@/models/config';
import { ConsoleSink } from './console-sink';
import { FileSink } from './file-sink';

/**
 * Pick the sink for an output mode
 */
export function createSink(mode: OutputMode, outputDir: string): IResultSink {
  switch (mode) {
    case OutputMode.FILE:
      return new FileSink(outputDir);
    case OutputMode.STDOUT:
      return new ConsoleSink();
  }
}
