import { Cell } from "@ton/core";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { CodecError, messageOf } from "../core/errors";

/** Deserializes a single-root bag of cells given as hex. */
export const parseBocHex = (hex: string): Cell => {
  let roots: Cell[];
  try {
    roots = Cell.fromBoc(Buffer.from(hexToBytes(hex)));
  } catch (e) {
    throw new CodecError("Malformed", `bad boc: ${messageOf(e)}`, { cause: e });
  }
  if (roots.length !== 1) {
    throw new CodecError("Malformed", `expected one root, got ${roots.length}`);
  }
  return roots[0];
};

// No index and no CRC32C: the canonical form wallets and explorers emit.
export const serializeBoc = (cell: Cell): Buffer =>
  cell.toBoc({ idx: false, crc32: false });

export const serializeBocHex = (cell: Cell): string =>
  bytesToHex(serializeBoc(cell));
