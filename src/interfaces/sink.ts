import type { EmitResult, EndpointDescriptor, HostIdentifier, JsonValue } from '../models/types';

/**
 * Destination for the payload of a host that answered
 */
export interface IResultSink {
  /**
   * @throws OutputWriteError when the payload cannot be written
   */
  emit(host: HostIdentifier, payload: JsonValue, endpoint: EndpointDescriptor): Promise<EmitResult>;
}
