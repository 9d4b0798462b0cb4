import { beginCell, type Builder, type Cell, type Slice } from "@ton/core";
import { CodecError, loading, storing } from "../core/errors";
import { assertValid, queryIdSchema } from "../model/validation";
import { formatOpcode, type Opcode } from "../types/brands";
import { expectEmpty } from "../codec/tlb";

/* ── identity contract ───────────────────────────────────── */

/** Instance side shared by every message kind. */
export interface TonMessage {
  readonly opcode: Opcode;
  queryId: bigint;
  withQueryId(queryId: bigint): this;
  build(): Cell;
}

/** Static side: what a dispatcher needs to decode a kind by opcode. */
export interface TonMessageType<M extends TonMessage = TonMessage> {
  readonly name: string;
  readonly opcode: Opcode;
  parse(cell: Cell): M;
}

export const verifyOpcode = (expected: Opcode, actual: number): void => {
  if (expected !== actual) {
    throw new CodecError(
      "SchemaMismatch",
      `unexpected opcode ${formatOpcode(actual)}, expected ${formatOpcode(expected)}`,
    );
  }
};

/** Leading 32 bits of a message body, without consuming anything. */
export const peekOpcode = (cell: Cell): number =>
  loading("opcode", () => cell.beginParse().preloadUint(32));

/* ── shared head: op:uint32 query_id:uint64 ──────────────── */

export const beginMessage = (opcode: Opcode, queryId: bigint): Builder => {
  assertValid(queryIdSchema, queryId, "query_id");
  return storing("message head", () =>
    beginCell().storeUint(opcode, 32).storeUint(queryId, 64),
  );
};

export const endMessage = (builder: Builder): Cell =>
  storing("message", () => builder.endCell());

export interface OpenedMessage {
  slice: Slice;
  queryId: bigint;
}

/**
 * Checks the opcode and reads the query id. The opcode is checked before
 * the body so a foreign kind never surfaces as a structural error.
 */
export const openMessage = (cell: Cell, opcode: Opcode): OpenedMessage => {
  const slice = loading("message", () => cell.beginParse());
  verifyOpcode(opcode, loading("opcode", () => slice.loadUint(32)));
  const queryId = loading("query_id", () => slice.loadUintBig(64));
  return { slice, queryId };
};

export const closeMessage = (slice: Slice, name: string): void =>
  expectEmpty(slice, name);
