import { DumpParseError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { parseIp } from '../model/address.js';
import { parseLinuxArp, parseOpenbsdArp, parseWindowsArp } from './arp.js';
import { guessDumpType } from './guess.js';
import { parseLinuxRoute, parseWindowsRoute } from './route.js';
import type { DumpOs, DumpParser, DumpType, ParseOptions, ParsedDump } from './types.js';

export { guessDumpType } from './guess.js';
export * from './types.js';

const PARSERS: Record<DumpType, Partial<Record<DumpOs, DumpParser>>> = {
  arp: {
    linux: parseLinuxArp,
    windows: parseWindowsArp,
    openbsd: parseOpenbsdArp,
  },
  route: {
    linux: parseLinuxRoute,
    windows: parseWindowsRoute,
  },
};

/**
 * Parse a host-local network dump into raw observations. Type and OS are
 * guessed from the dump's header lines unless given.
 */
export function parseDump(text: string, options: ParseOptions): ParsedDump {
  const logger = getLogger();

  let ip: string | null = null;
  if (options.ip !== undefined) {
    const parsed = parseIp(options.ip);
    if (!parsed) throw new DumpParseError(`Invalid centre IP: ${options.ip}`);
    ip = parsed.text;
  }

  let type = options.type;
  let os = options.os;
  if (!type || !os) {
    const guessed = guessDumpType(text);
    if (!guessed) {
      throw new DumpParseError('Cannot recognise the dump format; pass --type and --os');
    }
    if ((type && type !== guessed.type) || (os && os !== guessed.os)) {
      logger.debug({ given: { type, os }, guessed }, 'Dump header disagrees with the given format');
    }
    type = type ?? guessed.type;
    os = os ?? guessed.os;
    logger.debug({ type, os }, 'Guessed dump format');
  }

  const parser = PARSERS[type][os];
  if (!parser) {
    throw new DumpParseError(`Unsupported dump: ${type} on ${os}`);
  }

  const dump = parser(text, ip, options.observedAt);
  logger.debug({ type, os, records: dump.records.length, skipped: dump.skipped }, 'Dump parsed');
  return dump;
}
