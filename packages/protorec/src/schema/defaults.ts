/**
 * The registry protocol captures are written with by default
 */

import { SchemaRegistry } from './registry.js';
import { type CaptureInput, captureInputV1, captureInputV2 } from './builtin/capture.js';
import {
  type ParseFailure,
  type ParseIncomplete,
  type ParseNone,
  parseFailureV1,
  parseIncompleteV1,
  parseNoneV1,
} from './builtin/parse.js';
import { type Pop3Message, pop3MessageV1 } from './builtin/pop3.js';

/**
 * Every value the default registry can encode
 */
export type MessageValue = CaptureInput | ParseNone | ParseIncomplete | ParseFailure | Pop3Message;

export function createDefaultRegistry(): SchemaRegistry<MessageValue> {
  return new SchemaRegistry<MessageValue>()
    .register(captureInputV1)
    .register(captureInputV2)
    .register(parseNoneV1)
    .register(parseIncompleteV1)
    .register(parseFailureV1)
    .register(pop3MessageV1);
}
