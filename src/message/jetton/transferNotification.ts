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
import { JETTON_TRANSFER_NOTIFICATION } from "./opcodes";

/**
 * Sent by the receiving jetton wallet to its owner, TL-B:
 *
 * ```
 * transfer_notification#7362d09c query_id:uint64 amount:(VarUInteger 16)
 *                                sender:MsgAddress forward_payload:(Either Cell ^Cell)
 *                                = InternalMsgBody;
 * ```
 *
 * `forwardPayloadLayout` only affects `build`; parsed messages report
 * `Native` whichever branch the sender used.
 */
export class JettonTransferNotificationMessage implements TonMessage {
  static readonly opcode = JETTON_TRANSFER_NOTIFICATION;
  readonly opcode = JETTON_TRANSFER_NOTIFICATION;

  queryId = 0n;
  amount: bigint;
  /** previous owner of the transferred jettons */
  sender: Address | null;
  forwardPayload: Cell = Cell.EMPTY;
  forwardPayloadLayout: EitherLayout = EitherLayout.Native;

  constructor(sender: Address | null, amount: bigint) {
    this.sender = sender;
    this.amount = amount;
  }

  withQueryId(queryId: bigint): this {
    this.queryId = queryId;
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
    const b = beginMessage(this.opcode, this.queryId);
    coins.store(this.amount, b);
    address.store(this.sender, b);
    forwardPayloadCodec.store(this.forwardPayload, b, this.forwardPayloadLayout);
    return endMessage(b);
  }

  static parse(cell: Cell): JettonTransferNotificationMessage {
    const { slice, queryId } = openMessage(cell, JETTON_TRANSFER_NOTIFICATION);
    const amount = coins.load(slice);
    const sender = address.load(slice);
    const forwardPayload = forwardPayloadCodec.load(slice);
    closeMessage(slice, "transfer_notification");

    return new JettonTransferNotificationMessage(sender, amount)
      .withQueryId(queryId)
      .withForwardPayload(forwardPayload);
  }
}
