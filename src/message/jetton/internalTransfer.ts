import { Cell, type Address } from "@ton/core";
import { address, coins, EitherLayout } from "../../codec/tlb";
import { assertValid, coinsSchema } from "../../model/validation";
import {
  beginMessage,
  closeMessage,
  endMessage,
  openMessage,
  type TonMessage,
} from "../message";
import { forwardPayloadCodec } from "./fields";
import { JETTON_INTERNAL_TRANSFER } from "./opcodes";

/**
 * Wallet → wallet leg of a transfer.
 *
 * ```
 * internal_transfer#178d4519 query_id:uint64 amount:(VarUInteger 16) from:MsgAddress
 *                            response_address:MsgAddress forward_ton_amount:(VarUInteger 16)
 *                            forward_payload:(Either Cell ^Cell) = InternalMsgBody;
 * ```
 */
export class JettonInternalTransferMessage implements TonMessage {
  static readonly opcode = JETTON_INTERNAL_TRANSFER;
  readonly opcode = JETTON_INTERNAL_TRANSFER;

  queryId = 0n;
  amount: bigint;
  from: Address | null = null;
  responseAddress: Address | null = null;
  forwardTonAmount = 0n;
  forwardPayload: Cell = Cell.EMPTY;
  forwardPayloadLayout: EitherLayout = EitherLayout.Native;

  constructor(amount: bigint) {
    this.amount = amount;
  }

  withQueryId(queryId: bigint): this {
    this.queryId = queryId;
    return this;
  }

  withFrom(from: Address | null): this {
    this.from = from;
    return this;
  }

  withResponseAddress(responseAddress: Address | null): this {
    this.responseAddress = responseAddress;
    return this;
  }

  withForwardTonAmount(forwardTonAmount: bigint): this {
    this.forwardTonAmount = forwardTonAmount;
    return this;
  }

  withForwardPayload(forwardPayload: Cell): this {
    this.forwardPayload = forwardPayload;
    return this;
  }

  withForwardPayloadLayout(layout: EitherLayout): this {
    this.forwardPayloadLayout = layout;
    return this;
  }

  build(): Cell {
    assertValid(coinsSchema, this.amount, "amount");
    assertValid(coinsSchema, this.forwardTonAmount, "forward_ton_amount");
    const b = beginMessage(this.opcode, this.queryId);
    coins.store(this.amount, b);
    address.store(this.from, b);
    address.store(this.responseAddress, b);
    coins.store(this.forwardTonAmount, b);
    forwardPayloadCodec.store(this.forwardPayload, b, this.forwardPayloadLayout);
    return endMessage(b);
  }

  static parse(cell: Cell): JettonInternalTransferMessage {
    const { slice, queryId } = openMessage(cell, JETTON_INTERNAL_TRANSFER);
    const amount = coins.load(slice);
    const from = address.load(slice);
    const responseAddress = address.load(slice);
    const forwardTonAmount = coins.load(slice);
    const forwardPayload = forwardPayloadCodec.load(slice);
    closeMessage(slice, "internal_transfer");

    return new JettonInternalTransferMessage(amount)
      .withQueryId(queryId)
      .withFrom(from)
      .withResponseAddress(responseAddress)
      .withForwardTonAmount(forwardTonAmount)
      .withForwardPayload(forwardPayload);
  }
}
