import { dump } from 'js-yaml';
import { join } from 'path';
import type { IResultSink } from '@/interfaces/sink';
import { OutputWriteError, toError } from '@/errors/error-types';
import type { EmitResult, EndpointDescriptor, HostIdentifier, JsonValue } from '@/models/types';
import { ensureDirectoryExists, fileExists, writeTextFile } from '@/utils/fs';

const UNSAFE_FILE_CHARS = /[^A-Za-z0-9._:-]/gu;

/**
 * Percent-escape the UTF-8 bytes of every character outside `[A-Za-z0-9._:-]`.
 * `%` is itself escaped, so distinct hosts keep distinct names and
 * `decodeURIComponent` gives the host back.
 */
export function escapeHostForFile(host: HostIdentifier): string {
  return host.replace(UNSAFE_FILE_CHARS, (char) =>
    Array.from(Buffer.from(char, 'utf8'), byte => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`).join('')
  );
}

/**
 * Path of the record for a host
 */
export function recordPath(outputDir: string, host: HostIdentifier): string {
  return join(outputDir, `response_${escapeHostForFile(host)}.yaml`);
}

export async function hasRecord(outputDir: string, host: HostIdentifier): Promise<boolean> {
  return fileExists(recordPath(outputDir, host));
}

/**
 * Serialize a payload as YAML with sorted keys
 */
export function toYaml(payload: JsonValue): string {
  return dump(payload, { sortKeys: true, noRefs: true, lineWidth: -1 });
}

/**
 * Writes each payload to `response_<host>.yaml`, replacing any earlier record
 */
export class FileSink implements IResultSink {
  constructor(private readonly outputDir: string = '.') {}

  async emit(host: HostIdentifier, payload: JsonValue, _endpoint: EndpointDescriptor): Promise<EmitResult> {
    const path = recordPath(this.outputDir, host);

    try {
      await ensureDirectoryExists(this.outputDir);
      await writeTextFile(path, toYaml(payload));
    } catch (error) {
      throw new OutputWriteError(path, host, toError(error));
    }

    return { host, location: path };
  }
}
