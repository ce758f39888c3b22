import type { IResultSink } from '@/interfaces/sink';
import type { EmitResult, EndpointDescriptor, HostIdentifier, JsonValue } from '@/models/types';
import logger from '@/utils/logger';

export type Writer = (text: string) => void;

/**
 * Render a payload as indented JSON under a header naming host and port
 */
export function formatConsoleRecord(
  host: HostIdentifier,
  payload: JsonValue,
  endpoint: EndpointDescriptor
): { title: string; body: string } {
  return {
    title: `${host} (port ${endpoint.port})`,
    body: JSON.stringify(payload, null, 2),
  };
}

/**
 * Prints each payload to the console
 */
export class ConsoleSink implements IResultSink {
  constructor(
    private readonly writeTitle: Writer = (title) => logger.section(title),
    private readonly writeBody: Writer = (body) => logger.raw(body)
  ) {}

  async emit(host: HostIdentifier, payload: JsonValue, endpoint: EndpointDescriptor): Promise<EmitResult> {
    const { title, body } = formatConsoleRecord(host, payload, endpoint);
    this.writeTitle(title);
    this.writeBody(body);
    return { host, location: 'stdout' };
  }
}
