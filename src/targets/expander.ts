import { readFile } from 'fs/promises';
import { FileReadError, InvalidInputError, toError } from '@/errors/error-types';
import type { CidrBlock, HostIdentifier, TargetSource } from '@/models/types';

export type { CidrBlock };

const OCTET = /^(0|[1-9]\d{0,2})$/;

/**
 * Parse a dotted-quad IPv4 address. Returns null for anything else,
 * including octets with leading zeros.
 */
export function parseIPv4(text: string): number | null {
  const parts = text.split('.');
  if (parts.length !== 4) {
    return null;
  }

  let value = 0;
  for (const part of parts) {
    if (!OCTET.test(part)) {
      return null;
    }
    const octet = Number.parseInt(part, 10);
    if (octet > 255) {
      return null;
    }
    value = value * 256 + octet;
  }
  return value;
}

export function formatIPv4(value: number): string {
  return `${(value >>> 24) & 255}.${(value >>> 16) & 255}.${(value >>> 8) & 255}.${value & 255}`;
}

function prefixFromNetmask(mask: number): number | null {
  const inverted = ~mask >>> 0;
  // A contiguous mask inverts to 2^n - 1
  if ((inverted & (inverted + 1)) !== 0) {
    return null;
  }
  return 32 - Math.log2(inverted + 1);
}

function parsePrefix(text: string): number | null {
  if (/^\d{1,2}$/.test(text)) {
    const prefix = Number.parseInt(text, 10);
    return prefix <= 32 ? prefix : null;
  }
  const mask = parseIPv4(text);
  return mask === null ? null : prefixFromNetmask(mask);
}

/**
 * Parse `<address>/<prefix>`. The prefix may be a length or a dotted netmask;
 * host bits are masked off rather than rejected.
 */
export function parseCidr(text: string): CidrBlock {
  const [address, prefixText, ...rest] = text.trim().split('/');
  if (prefixText === undefined || rest.length > 0) {
    throw new InvalidInputError(text, 'expected <address>/<prefix>');
  }

  const base = parseIPv4(address);
  if (base === null) {
    throw new InvalidInputError(text, `"${address}" is not an IPv4 address`);
  }

  const prefix = parsePrefix(prefixText);
  if (prefix === null) {
    throw new InvalidInputError(text, `"${prefixText}" is not a valid prefix`);
  }

  const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  const network = (base & mask) >>> 0;
  const broadcast = (network | (~mask >>> 0)) >>> 0;
  return { network, broadcast, prefix };
}

/**
 * Number of addresses `cidrHosts` yields for a block
 */
export function countHosts(block: CidrBlock): number {
  const size = block.broadcast - block.network + 1;
  return block.prefix >= 31 ? size : size - 2;
}

/**
 * Whether `cidrHosts` yields the address
 */
export function blockContains(block: CidrBlock, address: number): boolean {
  if (block.prefix >= 31) {
    return address >= block.network && address <= block.broadcast;
  }
  return address > block.network && address < block.broadcast;
}

/**
 * Lazily yield the usable hosts of a block. Network and broadcast addresses
 * are skipped, except for /31 point-to-point links and /32 single hosts.
 */
export function* cidrHosts(block: CidrBlock): Generator<HostIdentifier> {
  if (block.prefix >= 31) {
    for (let n = block.network; n <= block.broadcast; n++) {
      yield formatIPv4(n);
    }
    return;
  }

  for (let n = block.network + 1; n < block.broadcast; n++) {
    yield formatIPv4(n);
  }
}

/**
 * Interpret `--ip_input`: a single address first, a CIDR range otherwise
 */
export function expandAddressInput(input: string): TargetSource {
  const trimmed = input.trim();
  const single = parseIPv4(trimmed);

  if (single !== null) {
    const host = formatIPv4(single);
    return {
      label: 'ip_input',
      description: `single address ${host}`,
      count: 1,
      hosts: [host],
    };
  }

  const block = parseCidr(trimmed);
  const count = countHosts(block);
  return {
    label: 'ip_input',
    description: `range ${formatIPv4(block.network)}/${block.prefix}`,
    count,
    block,
    hosts: { [Symbol.iterator]: () => cidrHosts(block) },
  };
}

/**
 * Split file content into host identifiers, one per non-empty line
 */
export function parseHostList(content: string): HostIdentifier[] {
  return content
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Read a newline-delimited host list. Entries are not validated here; a bad
 * entry surfaces as a transport error when it is probed.
 */
export async function readHostFile(path: string): Promise<TargetSource> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new FileReadError(path, toError(error));
  }

  const hosts = parseHostList(content);
  return {
    label: 'ip_file',
    description: `file ${path}`,
    count: hosts.length,
    hosts,
  };
}

/**
 * Chain sources in order, dropping hosts already yielded in this run.
 * Range sources are never recorded: a listed host is matched against the
 * earlier ranges by its address, so the set only grows with listed hosts.
 */
export function* uniqueHosts(sources: Iterable<TargetSource>): Generator<HostIdentifier> {
  const listed = new Set<HostIdentifier>();
  const ranges: CidrBlock[] = [];

  const inEarlierRange = (host: HostIdentifier): boolean => {
    const address = parseIPv4(host);
    return address !== null && ranges.some(block => blockContains(block, address));
  };

  for (const source of sources) {
    const { block } = source;

    for (const host of source.hosts) {
      if (listed.has(host) || inEarlierRange(host)) {
        continue;
      }
      if (!block) {
        listed.add(host);
      }
      yield host;
    }

    if (block) {
      ranges.push(block);
    }
  }
}
