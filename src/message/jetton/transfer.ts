import { Cell, type Address } from "@ton/core";
import { address, coins, EitherLayout, fromNullable, toNullable } from "../../codec/tlb";
import { assertValid, coinsSchema } from "../../model/validation";
import {
  beginMessage,
  closeMessage,
  endMessage,
  openMessage,
  type TonMessage,
} from "../message";
import { customPayloadCodec, forwardPayloadCodec } from "./fields";
import { JETTON_TRANSFER } from "./opcodes";

/**
 * Owner → own jetton wallet transfer request, TL-B:
 *
 * ```
 * transfer#0f8a7ea5 query_id:uint64 amount:(VarUInteger 16) destination:MsgAddress
 *                   response_destination:MsgAddress custom_payload:(Maybe ^Cell)
 *                   forward_ton_amount:(VarUInteger 16) forward_payload:(Either Cell ^Cell)
 *                   = InternalMsgBody;
 * ```
 */
export class JettonTransferMessage implements TonMessage {
  static readonly opcode = JETTON_TRANSFER;
  readonly opcode = JETTON_TRANSFER;

  queryId = 0n;
  amount: bigint;
  destination: Address | null;
  responseDestination: Address | null = null;
  customPayload: Cell | null = null;
  /** nanotons attached to the notification sent to `destination` */
  forwardTonAmount = 0n;
  forwardPayload: Cell = Cell.EMPTY;
  forwardPayloadLayout: EitherLayout = EitherLayout.Native;

  constructor(destination: Address | null, amount: bigint) {
    this.destination = destination;
    this.amount = amount;
  }

  withQueryId(queryId: bigint): this {
    this.queryId = queryId;
    return this;
  }

  withResponseDestination(responseDestination: Address | null): this {
    this.responseDestination = responseDestination;
    return this;
  }

  withCustomPayload(customPayload: Cell | null): this {
    this.customPayload = customPayload;
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
    address.store(this.destination, b);
    address.store(this.responseDestination, b);
    customPayloadCodec.store(fromNullable(this.customPayload), b);
    coins.store(this.forwardTonAmount, b);
    forwardPayloadCodec.store(this.forwardPayload, b, this.forwardPayloadLayout);
    return endMessage(b);
  }

  static parse(cell: Cell): JettonTransferMessage {
    const { slice, queryId } = openMessage(cell, JETTON_TRANSFER);
    const amount = coins.load(slice);
    const destination = address.load(slice);
    const responseDestination = address.load(slice);
    const customPayload = toNullable(customPayloadCodec.load(slice));
    const forwardTonAmount = coins.load(slice);
    const forwardPayload = forwardPayloadCodec.load(slice);
    closeMessage(slice, "transfer");

    return new JettonTransferMessage(destination, amount)
      .withQueryId(queryId)
      .withResponseDestination(responseDestination)
      .withCustomPayload(customPayload)
      .withForwardTonAmount(forwardTonAmount)
      .withForwardPayload(forwardPayload);
  }
}
