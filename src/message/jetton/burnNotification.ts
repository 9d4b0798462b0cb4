import type { Address, Cell } from "@ton/core";
import { address, coins } from "../../codec/tlb";
import { assertValid, coinsSchema } from "../../model/validation";
import {
  beginMessage,
  closeMessage,
  endMessage,
  openMessage,
  type TonMessage,
} from "../message";
import { JETTON_BURN_NOTIFICATION } from "./opcodes";

// burn_notification#7bdd97de query_id:uint64 amount:(VarUInteger 16)
//   sender:MsgAddress response_destination:MsgAddress = InternalMsgBody;
export class JettonBurnNotificationMessage implements TonMessage {
  static readonly opcode = JETTON_BURN_NOTIFICATION;
  readonly opcode = JETTON_BURN_NOTIFICATION;

  queryId = 0n;
  amount: bigint;
  sender: Address | null = null;
  responseDestination: Address | null = null;

  constructor(amount: bigint) {
    this.amount = amount;
  }

  withQueryId(queryId: bigint): this {
    this.queryId = queryId;
    return this;
  }

  withSender(sender: Address | null): this {
    this.sender = sender;
    return this;
  }

  withResponseDestination(responseDestination: Address | null): this {
    this.responseDestination = responseDestination;
    return this;
  }

  build(): Cell {
    assertValid(coinsSchema, this.amount, "amount");
    const b = beginMessage(this.opcode, this.queryId);
    coins.store(this.amount, b);
    address.store(this.sender, b);
    address.store(this.responseDestination, b);
    return endMessage(b);
  }

  static parse(cell: Cell): JettonBurnNotificationMessage {
    const { slice, queryId } = openMessage(cell, JETTON_BURN_NOTIFICATION);
    const amount = coins.load(slice);
    const sender = address.load(slice);
    const responseDestination = address.load(slice);
    closeMessage(slice, "burn_notification");

    return new JettonBurnNotificationMessage(amount)
      .withQueryId(queryId)
      .withSender(sender)
      .withResponseDestination(responseDestination);
  }
}
