/**
 * POP3 messages as a POP3 parser emits them: client commands and server
 * responses, each with the non-fatal errors the parser flagged.
 */

import { ErrorCode, ProtorecError } from '../../types/errors.js';
import type { Variant } from '../../types/values.js';
import { asBytes, asUint, type FieldReader, type WireMap } from '../../wire/fields.js';
import type { SchemaDefinition } from '../registry.js';

export enum Pop3Keyword {
  QUIT = 1,
  STAT = 2,
  LIST = 3,
  RETR = 4,
  DELE = 5,
  NOOP = 6,
  RSET = 7,
  TOP = 8,
  UIDL = 9,
  USER = 10,
  PASS = 11,
  APOP = 12,
  CAPA = 13,
  STLS = 14,
  AUTH = 15,
  SASL = 16,
}

export enum Pop3Status {
  OK = 0,
  ERR = 1,
}

/**
 * Protocol violations the parser reports without failing
 */
export enum Pop3ErrorFlag {
  /** Command line longer than 255 octets */
  CommandTooLong = 0x01,
  /** Argument count does not fit the keyword */
  IncorrectArgumentNum = 0x02,
  /** Well-formed keyword the parser does not know */
  UnknownKeyword = 0x04,
  /** First response line longer than 512 octets */
  ResponseTooLong = 0x08,
}

export const POP3_ERROR_FLAG_MASK = 0x0f;

const KEYWORDS = Object.values(Pop3Keyword).filter((entry): entry is Pop3Keyword => typeof entry === 'number');
const STATUSES: readonly Pop3Status[] = [Pop3Status.OK, Pop3Status.ERR];

export interface Pop3Command {
  readonly type: 'command';
  /**
   * Known keyword, or the text of one the parser did not recognise. Text that
   * names a known keyword is rejected on encode; pass it through
   * parsePop3Keyword() first.
   */
  readonly keyword: Pop3Keyword | string;
  readonly args: Uint8Array[];
}

export interface Pop3Response {
  readonly type: 'response';
  readonly status: Pop3Status;
  readonly header: Uint8Array;
  /** Multi-line body, one entry per line */
  readonly data: Uint8Array[];
}

export interface Pop3Message extends Variant {
  readonly kind: 'pop3.message';
  /** Bit set of Pop3ErrorFlag */
  readonly errorFlags: number;
  readonly inner: Pop3Command | Pop3Response;
}

/**
 * Keyword for command text. Text outside the known set is kept as is.
 */
export function parsePop3Keyword(text: string): Pop3Keyword | string {
  return KEYWORDS.find((keyword) => Pop3Keyword[keyword] === text) ?? text;
}

export function pop3KeywordName(keyword: Pop3Keyword | string): string {
  return typeof keyword === 'number' ? Pop3Keyword[keyword] : keyword;
}

/**
 * Names of the flags set in `flags`
 */
export function pop3ErrorFlagNames(flags: number): string[] {
  return Object.values(Pop3ErrorFlag)
    .filter((flag): flag is Pop3ErrorFlag => typeof flag === 'number')
    .filter((flag) => (flags & flag) !== 0)
    .map((flag) => Pop3ErrorFlag[flag]);
}

function checkFlags(flags: number, path: string): number {
  if ((asUint(flags, path) & ~POP3_ERROR_FLAG_MASK) !== 0) {
    throw new ProtorecError(
      ErrorCode.ERR_SCHEMA_MISMATCH,
      `Field ${path}: unknown error flags 0x${flags.toString(16).padStart(2, '0')}`
    );
  }
  return flags;
}

function checkKeyword(code: number, path: string): Pop3Keyword {
  const known = KEYWORDS.find((entry) => entry === code);
  if (known === undefined) {
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Field ${path}: unknown keyword code ${code}`);
  }
  return known;
}

function checkStatus(code: number, path: string): Pop3Status {
  const status = STATUSES.find((entry) => entry === code);
  if (status === undefined) {
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Field ${path}: unknown status ${code}`);
  }
  return status;
}

function checkUnknownKeyword(text: string, path: string): string {
  if (typeof parsePop3Keyword(text) === 'number') {
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Field ${path}: ${text} is a known keyword`);
  }
  return text;
}

function commandToWire(command: Pop3Command): WireMap {
  const { keyword } = command;
  return typeof keyword === 'string'
    ? { u: checkUnknownKeyword(keyword, '$.c.u'), a: command.args }
    : { k: checkKeyword(keyword, '$.c.k'), a: command.args };
}

function responseToWire(response: Pop3Response): WireMap {
  return { s: checkStatus(response.status, '$.r.s'), h: response.header, d: response.data };
}

function commandFromWire(fields: FieldReader): Pop3Command {
  const keyword = fields.has('u')
    ? checkUnknownKeyword(fields.text('u'), `${fields.path}.u`)
    : checkKeyword(fields.uint('k'), `${fields.path}.k`);
  return { type: 'command', keyword, args: fields.array('a', asBytes) };
}

function responseFromWire(fields: FieldReader): Pop3Response {
  return {
    type: 'response',
    status: checkStatus(fields.uint('s'), `${fields.path}.s`),
    header: fields.bytes('h'),
    data: fields.array('d', asBytes),
  };
}

export const pop3MessageV1: SchemaDefinition<Pop3Message> = {
  tag: 0x0100,
  kind: 'pop3.message',
  version: 1,
  layout: 'map',
  description: 'POP3 command or response',
  toWire(value): WireMap {
    const e = checkFlags(value.errorFlags, '$.e');
    const { inner } = value;
    return inner.type === 'command' ? { e, c: commandToWire(inner) } : { e, r: responseToWire(inner) };
  },
  fromWire(fields) {
    const errorFlags = checkFlags(fields.uint('e'), `${fields.path}.e`);
    const inner = fields.has('c') ? fields.map('c', commandFromWire) : fields.map('r', responseFromWire);
    return { kind: 'pop3.message', errorFlags, inner };
  },
};
