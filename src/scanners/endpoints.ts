import type { EndpointDescriptor, HostIdentifier } from '@/models/types';

const HOST_SLOT = '{host}';

/**
 * Device REST endpoints, tried in this order. The system health summary on
 * 8888 is preferred; the hardware view on 443 is the fallback.
 */
export const DEFAULT_ENDPOINTS: readonly EndpointDescriptor[] = Object.freeze([
  Object.freeze({
    urlTemplate:
      'https://{host}:8888/restconf/data/openconfig-system:system/f5-system-health:health/f5-system-health:summary/f5-system-health:components',
    headers: Object.freeze({ 'Content-Type': 'application/yang-data+json' }),
    port: 8888,
  }),
  Object.freeze({
    urlTemplate: 'https://{host}:443/mgmt/tm/sys/hardware',
    headers: Object.freeze({ 'Content-Type': 'application/json' }),
    port: 443,
  }),
]);

/**
 * Substitute a host into an endpoint's URL template
 */
export function renderUrl(endpoint: EndpointDescriptor, host: HostIdentifier): string {
  return endpoint.urlTemplate.replace(HOST_SLOT, () => host);
}
