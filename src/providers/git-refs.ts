/**
 * Git refs advertisement parsing.
 *
 * Smart HTTP (`/info/refs?service=git-upload-pack`) answers in pkt-line
 * framing: a 4-hex-digit length (header included) followed by the payload,
 * `0000` as flush. Dumb HTTP servers answer with plain `<sha>\t<ref>` lines;
 * both are accepted.
 * See: https://git-scm.com/docs/http-protocol
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PktLine {
  type: 'data' | 'flush' | 'delimiter';
  /** Payload with the trailing newline removed; null for control packets */
  payload: string | null;
}

export interface RefInfo {
  sha: string;
  /** Full ref name, e.g. refs/tags/v1.0 */
  name: string;
  /** Commit an annotated tag points at */
  peeled?: string;
}

export interface RefsAdvertisement {
  service: string | null;
  capabilities: string[];
  refs: RefInfo[];
}

export interface TagRef {
  /** Tag name without refs/tags/ */
  tag: string;
  sha: string;
  peeled: string | null;
}

export class RefsParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RefsParseError';
  }
}

// ---------------------------------------------------------------------------
// pkt-line
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Split pkt-line framed input into packets. Lengths count bytes. */
export function parsePktLines(input: string): PktLine[] {
  const bytes = encoder.encode(input);
  const lines: PktLine[] = [];
  let offset = 0;

  while (offset < bytes.length) {
    if (offset + 4 > bytes.length) {
      throw new RefsParseError(`truncated pkt-line header at byte ${offset}`);
    }
    const header = decoder.decode(bytes.subarray(offset, offset + 4));
    if (!/^[0-9a-f]{4}$/i.test(header)) {
      throw new RefsParseError(`invalid pkt-line length "${header}" at byte ${offset}`);
    }
    const length = parseInt(header, 16);

    if (length === 0 || length === 1 || length === 2) {
      lines.push({ type: length === 1 ? 'delimiter' : 'flush', payload: null });
      offset += 4;
      continue;
    }
    if (length < 4 || offset + length > bytes.length) {
      throw new RefsParseError(`pkt-line of length ${length} overruns input at byte ${offset}`);
    }

    const payload = decoder.decode(bytes.subarray(offset + 4, offset + length));
    lines.push({ type: 'data', payload: payload.endsWith('\n') ? payload.slice(0, -1) : payload });
    offset += length;
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Advertisement
// ---------------------------------------------------------------------------

const REF_LINE = /^([0-9a-f]{40}|[0-9a-f]{64})[ \t](\S+)$/;

function addRef(refs: RefInfo[], sha: string, name: string): void {
  if (name.endsWith('^{}')) {
    const base = name.slice(0, -3);
    const target = refs.find((ref) => ref.name === base);
    if (target) target.peeled = sha;
    return;
  }
  refs.push({ sha, name });
}

function parseDumb(input: string): RefsAdvertisement {
  const refs: RefInfo[] = [];
  for (const line of input.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;
    const match = REF_LINE.exec(trimmed);
    if (!match?.[1] || !match[2]) throw new RefsParseError(`unrecognised ref line "${trimmed}"`);
    addRef(refs, match[1], match[2]);
  }
  return { service: null, capabilities: [], refs };
}

/**
 * Parse a refs advertisement from either protocol flavour.
 * @throws RefsParseError on malformed input
 */
export function parseRefsAdvertisement(input: string): RefsAdvertisement {
  if (input.trim() === '') return { service: null, capabilities: [], refs: [] };
  if (!/^[0-9a-f]{4}/i.test(input) || REF_LINE.test(input.split('\n')[0]?.trim() ?? '')) {
    return parseDumb(input);
  }

  let service: string | null = null;
  let capabilities: string[] = [];
  const refs: RefInfo[] = [];

  for (const line of parsePktLines(input)) {
    if (line.payload === null) continue;

    const serviceHeader = /^# service=(\S+)$/.exec(line.payload);
    if (serviceHeader?.[1]) {
      service = serviceHeader[1];
      continue;
    }

    // The first ref carries the capability list after a NUL byte.
    const [refPart = '', capabilityPart] = line.payload.split('\0');
    if (capabilityPart !== undefined) {
      capabilities = capabilityPart.trim().split(' ').filter((cap) => cap !== '');
    }

    const match = REF_LINE.exec(refPart.trim());
    if (!match?.[1] || !match[2]) throw new RefsParseError(`unrecognised ref line "${refPart}"`);
    // An empty repository advertises a single placeholder ref.
    if (match[2] === 'capabilities^{}') continue;
    addRef(refs, match[1], match[2]);
  }

  return { service, capabilities, refs };
}

/** Tags of an advertisement, with peeled targets merged in. */
export function tagRefs(advertisement: RefsAdvertisement): TagRef[] {
  return advertisement.refs
    .filter((ref) => ref.name.startsWith('refs/tags/'))
    .map((ref) => ({
      tag: ref.name.slice('refs/tags/'.length),
      sha: ref.sha,
      peeled: ref.peeled ?? null,
    }));
}
