import {
  AllocationFailureError,
  GrammarMismatchError,
  PayloadLengthOutOfRangeError,
} from '../errors/index.js';
import type {
  ParseOutcome,
  ParseToken,
  ParseTree,
  UintWidth,
} from '../grammar/index.js';
import { defaultDecoderOptions } from './options.js';
import type { DecodeResult, DecoderOptions } from './types.js';

/**
 * Maps the parse outcome of the datagram grammar to a Datagram.
 *
 * Each field is looked up by name and checked for kind, width and range
 * before use. The declared payload length is compared with the capacity
 * before any payload memory is allocated, so an oversized datagram never
 * reaches the copy loop.
 *
 * The tree is only read and no reference to it is kept.
 */
export function extractDatagram(
  outcome: ParseOutcome,
  options: DecoderOptions = defaultDecoderOptions,
): DecodeResult {
  if (!outcome.success) {
    return mismatch(outcome.reason, outcome.field, outcome.offset);
  }

  const { tree } = outcome;

  const sourcePort = readUint(tree, 'sourcePort', 2);
  if (sourcePort === undefined) return malformed('sourcePort');

  const destinationPort = readUint(tree, 'destinationPort', 2);
  if (destinationPort === undefined) return malformed('destinationPort');

  const payloadLength = readUint(tree, 'payloadLength', 2);
  if (payloadLength === undefined) return malformed('payloadLength');

  const checksum = readUint(tree, 'checksum', 2);
  if (checksum === undefined) return malformed('checksum');

  if (payloadLength > options.payloadCapacity) {
    return {
      ok: false,
      error: new PayloadLengthOutOfRangeError(
        payloadLength,
        options.payloadCapacity,
      ),
    };
  }

  const elements = readSequence(tree, 'payload');
  if (elements === undefined || elements.length !== payloadLength) {
    return malformed('payload');
  }

  let payload: Uint8Array;
  try {
    payload = options.allocatePayload(payloadLength);
  } catch (error) {
    if (error instanceof RangeError) {
      return {
        ok: false,
        error: new AllocationFailureError(payloadLength, error),
      };
    }
    throw error;
  }
  if (payload.length !== payloadLength) {
    return { ok: false, error: new AllocationFailureError(payloadLength) };
  }

  for (let i = 0; i < payloadLength; i++) {
    const byte = uintValue(elements[i], 1);
    if (byte === undefined) return malformed('payload');
    payload[i] = byte;
  }

  return {
    ok: true,
    datagram: { sourcePort, destinationPort, payloadLength, checksum, payload },
  };
}

function findToken(tree: ParseTree, name: string): ParseToken | undefined {
  return tree.find((named) => named.name === name)?.token;
}

/**
 * Reads a uint token of the given width, or undefined if the token is
 * missing, of another kind, or holds a value the width cannot carry.
 */
function readUint(
  tree: ParseTree,
  name: string,
  width: UintWidth,
): number | undefined {
  return uintValue(findToken(tree, name), width);
}

function uintValue(
  token: ParseToken | undefined,
  width: UintWidth,
): number | undefined {
  if (token?.kind !== 'uint' || token.width !== width) return undefined;
  const max = 2 ** (8 * width) - 1;
  if (!Number.isInteger(token.value) || token.value < 0 || token.value > max) {
    return undefined;
  }
  return token.value;
}

function readSequence(
  tree: ParseTree,
  name: string,
): readonly ParseToken[] | undefined {
  const token = findToken(tree, name);
  return token?.kind === 'sequence' ? token.elements : undefined;
}

function mismatch(
  reason: string,
  field: string | undefined,
  offset: number | undefined,
): DecodeResult {
  return { ok: false, error: new GrammarMismatchError(reason, field, offset) };
}

function malformed(field: string): DecodeResult {
  return mismatch(`Parse tree has no valid "${field}" token`, field, undefined);
}
