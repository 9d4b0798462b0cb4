/**
 * Generic TL-B combinators over @ton/core cells.
 *
 * A codec is any `{ store, load }` pair; `maybeRef` and `either` work for
 * every payload codec without looking at the value at runtime.
 */

import { beginCell, type Address, type Builder, type Cell, type Slice } from "@ton/core";
import { CodecError, loading, storing } from "../core/errors";
import { assertValid, coinsSchema, uintSchema } from "../model/validation";

export interface TlbCodec<T> {
  store(value: T, builder: Builder): void;
  load(slice: Slice): T;
}

/* ── Maybe ───────────────────────────────────────────────── */

export type Maybe<T> =
  | { readonly kind: "none" }
  | { readonly kind: "some"; readonly value: T };

const NONE: Maybe<never> = { kind: "none" };

export const none = <T>(): Maybe<T> => NONE;
export const some = <T>(value: T): Maybe<T> => ({ kind: "some", value });

export const fromNullable = <T>(v: T | null | undefined): Maybe<T> =>
  v === null || v === undefined ? NONE : some(v);

export const toNullable = <T>(m: Maybe<T>): T | null =>
  m.kind === "some" ? m.value : null;

/** Throws TrailingData unless `slice` has no bits or refs left. */
export const expectEmpty = (slice: Slice, what: string): void => {
  if (slice.remainingBits > 0 || slice.remainingRefs > 0) {
    throw new CodecError(
      "TrailingData",
      `${what}: ${slice.remainingBits} bits and ${slice.remainingRefs} refs left unread`,
    );
  }
};

/** Decodes `codec` from a whole cell; the cell must be consumed exactly. */
export const loadWhole = <T>(codec: TlbCodec<T>, cell: Cell, what: string): T => {
  const slice = loading(what, () => cell.beginParse());
  const value = codec.load(slice);
  expectEmpty(slice, what);
  return value;
};

/**
 * Throws CapacityExceeded unless `builder` can take `bits` and `refs` more.
 * Multi-part writes call this first so a failure leaves the builder as it was.
 */
export const ensureRoom = (builder: Builder, bits: number, refs: number, what: string): void => {
  if (bits > builder.availableBits || refs > builder.availableRefs) {
    throw new CodecError(
      "CapacityExceeded",
      `cannot store ${what}: needs ${bits} bits and ${refs} refs, ` +
        `${builder.availableBits} bits and ${builder.availableRefs} refs available`,
    );
  }
};

/** Encodes `value` into a cell of its own. */
export const toCell = <T>(codec: TlbCodec<T>, value: T): Cell => {
  const b = beginCell();
  codec.store(value, b);
  return b.endCell();
};

/** `Maybe ^X`: flag bit, then the payload in a referenced child cell. */
export const maybeRef = <T>(codec: TlbCodec<T>): TlbCodec<Maybe<T>> => ({
  store(value, builder) {
    if (value.kind === "none") {
      storing("maybe flag", () => builder.storeBit(false));
      return;
    }
    const child = toCell(codec, value.value);
    ensureRoom(builder, 1, 1, "maybe ref");
    storing("maybe ref", () => builder.storeBit(true).storeRef(child));
  },
  load(slice) {
    if (!loading("maybe flag", () => slice.loadBit())) return none();
    const child = loading("maybe ref", () => slice.loadRef());
    return some(loadWhole(codec, child, "maybe payload"));
  },
});

/** `Maybe X`: flag bit, then the payload inline. */
export const maybe = <T>(codec: TlbCodec<T>): TlbCodec<Maybe<T>> => ({
  store(value, builder) {
    if (value.kind === "none") {
      storing("maybe flag", () => builder.storeBit(false));
      return;
    }
    const payload = toCell(codec, value.value);
    ensureRoom(builder, payload.bits.length + 1, payload.refs.length, "maybe inline");
    storing("maybe inline", () =>
      builder.storeBit(true).storeSlice(payload.beginParse()),
    );
  },
  load(slice) {
    if (!loading("maybe flag", () => slice.loadBit())) return none();
    return some(codec.load(slice));
  },
});

/* ── Either ──────────────────────────────────────────────── */

export const EitherLayout = {
  /** inline when the payload fits after the flag bit, otherwise by reference */
  Native: "native",
  /** always `1` + reference */
  ToRef: "toRef",
  /** always `0` + inline */
  ToCell: "toCell",
} as const;

export type EitherLayout = (typeof EitherLayout)[keyof typeof EitherLayout];

export interface EitherCodec<T> {
  store(value: T, builder: Builder, layout: EitherLayout): void;
  load(slice: Slice): T;
}

const fitsInline = (payload: Cell, builder: Builder): boolean =>
  payload.bits.length + 1 <= builder.availableBits &&
  payload.refs.length <= builder.availableRefs;

/**
 * `Either X ^X`. The writer takes the branch `layout` selects; the reader
 * follows the flag bit only.
 */
export const either = <T>(codec: TlbCodec<T>): EitherCodec<T> => ({
  store(value, builder, layout) {
    const payload = toCell(codec, value);
    const byRef =
      layout === EitherLayout.ToRef ||
      (layout === EitherLayout.Native && !fitsInline(payload, builder));
    if (byRef) {
      ensureRoom(builder, 1, 1, "either ref");
      storing("either ref", () => builder.storeBit(true).storeRef(payload));
    } else {
      ensureRoom(builder, payload.bits.length + 1, payload.refs.length, "either inline");
      storing("either inline", () =>
        builder.storeBit(false).storeSlice(payload.beginParse()),
      );
    }
  },
  load(slice) {
    if (!loading("either flag", () => slice.loadBit())) return codec.load(slice);
    const child = loading("either ref", () => slice.loadRef());
    return loadWhole(codec, child, "either payload");
  },
});

/** Pins an Either layout so the result nests inside other combinators. */
export const eitherWith = <T>(codec: TlbCodec<T>, layout: EitherLayout): TlbCodec<T> => {
  const inner = either(codec);
  return {
    store: (value, builder) => inner.store(value, builder, layout),
    load: (slice) => inner.load(slice),
  };
};

/* ── primitives ──────────────────────────────────────────── */

/** TL-B `Cell`: whatever bits and refs remain. */
export const anyCell: TlbCodec<Cell> = {
  store(value, builder) {
    ensureRoom(builder, value.bits.length, value.refs.length, "cell");
    storing("cell", () => builder.storeSlice(value.beginParse()));
  },
  load(slice) {
    return loading("cell", () => {
      const b = beginCell().storeBits(slice.loadBits(slice.remainingBits));
      while (slice.remainingRefs > 0) b.storeRef(slice.loadRef());
      return b.endCell();
    });
  },
};

export const uint = (bits: number): TlbCodec<bigint> => {
  const schema = uintSchema(bits);
  return {
    store(value, builder) {
      assertValid(schema, value, `uint${bits}`);
      storing(`uint${bits}`, () => builder.storeUint(value, bits));
    },
    load: (slice) => loading(`uint${bits}`, () => slice.loadUintBig(bits)),
  };
};

/** `VarUInteger 16`: 4-bit byte count, then the minimal big-endian magnitude. */
export const coins: TlbCodec<bigint> = {
  store(value, builder) {
    assertValid(coinsSchema, value, "coins");
    storing("coins", () => builder.storeCoins(value));
  },
  load: (slice) => loading("coins", () => slice.loadCoins()),
};

/** `MsgAddress` restricted to `addr_none` (null) and `addr_std`. */
export const address: TlbCodec<Address | null> = {
  store(value, builder) {
    storing("address", () => builder.storeAddress(value));
  },
  load: (slice) => loading("address", () => slice.loadMaybeAddress()),
};
