import dnsPacket from 'dns-packet';
import type { Packet, Question, RecordType } from 'dns-packet';

export type DNSMessage = Packet;
export type DNSQuestion = Question;

// Response codes carried in the low 4 bits of the header flags
export const RCODE = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

const RESPONSE_FLAG = 0x8000;

export function encodeMessage(message: DNSMessage): Buffer {
  return dnsPacket.encode(message);
}

/**
 * Decode wire bytes. Throws on truncated or malformed input.
 */
export function decodeMessage(data: Buffer): DNSMessage {
  return dnsPacket.decode(data);
}

export function responseCode(message: DNSMessage): number {
  return (message.flags ?? 0) & 0x0f;
}

export function rcodeName(rcode: number): string {
  const entry = Object.entries(RCODE).find(([, value]) => value === rcode);
  return entry ? entry[0] : `RCODE${rcode}`;
}

export function firstQuestion(message: DNSMessage): DNSQuestion | undefined {
  return message.questions?.[0];
}

/**
 * Name of the first question, or an empty string for a message without one.
 */
export function queryName(message: DNSMessage): string {
  return firstQuestion(message)?.name ?? '';
}

/**
 * Strip the trailing root dot from a fully qualified name. The root itself becomes `''`.
 */
export function unFqdn(name: string): string {
  return name.endsWith('.') ? name.slice(0, -1) : name;
}

export function createQuery(name: string, type: RecordType, id: number = Math.floor(Math.random() * 0xffff)): DNSMessage {
  return {
    type: 'query',
    id,
    flags: dnsPacket.RECURSION_DESIRED,
    questions: [{ type, name: unFqdn(name), class: 'IN' }],
  };
}

/**
 * Build a header-only reply for `query` carrying `rcode`, keeping its id, opcode and question.
 */
export function createErrorResponse(query: DNSMessage, rcode: number): DNSMessage {
  const baseFlags = query.flags ?? 0;
  return {
    type: 'response',
    id: query.id ?? 0,
    flags: (baseFlags & ~0x0f) | RESPONSE_FLAG | (rcode & 0x0f),
    questions: query.questions ?? [],
    answers: [],
    authorities: [],
    additionals: [],
  };
}

const recordTypes: readonly RecordType[] = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'DNAME',
  'DNSKEY',
  'DS',
  'HINFO',
  'MX',
  'NAPTR',
  'NS',
  'NSEC',
  'NSEC3',
  'NULL',
  'OPT',
  'PTR',
  'RP',
  'RRSIG',
  'SOA',
  'SRV',
  'SSHFP',
  'TLSA',
  'TXT',
];

export function isRecordType(value: string): value is RecordType {
  return recordTypes.some((type) => type === value);
}
