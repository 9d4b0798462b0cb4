import type { Address, Cell } from "@ton/core";
import { address, coins, fromNullable, toNullable } from "../../codec/tlb";
import { assertValid, coinsSchema } from "../../model/validation";
import {
  beginMessage,
  closeMessage,
  endMessage,
  openMessage,
  type TonMessage,
} from "../message";
import { customPayloadCodec } from "./fields";
import { JETTON_BURN } from "./opcodes";

/**
 * Body of a jetton burn request, TL-B:
 *
 * ```
 * burn#595f07bc query_id:uint64 amount:(VarUInteger 16)
 *               response_destination:MsgAddress custom_payload:(Maybe ^Cell)
 *               = InternalMsgBody;
 * ```
 */
export class JettonBurnMessage implements TonMessage {
  static readonly opcode = JETTON_BURN;
  readonly opcode = JETTON_BURN;

  queryId = 0n;
  /** amount of burned jettons */
  amount: bigint;
  /** receives the burn confirmation and the remaining TON */
  responseDestination: Address | null = null;
  customPayload: Cell | null = null;

  constructor(amount: bigint) {
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

  build(): Cell {
    assertValid(coinsSchema, this.amount, "amount");
    const b = beginMessage(this.opcode, this.queryId);
    coins.store(this.amount, b);
    address.store(this.responseDestination, b);
    customPayloadCodec.store(fromNullable(this.customPayload), b);
    return endMessage(b);
  }

  static parse(cell: Cell): JettonBurnMessage {
    const { slice, queryId } = openMessage(cell, JETTON_BURN);
    const amount = coins.load(slice);
    const responseDestination = address.load(slice);
    const customPayload = toNullable(customPayloadCodec.load(slice));
    closeMessage(slice, "burn");

    return new JettonBurnMessage(amount)
      .withQueryId(queryId)
      .withResponseDestination(responseDestination)
      .withCustomPayload(customPayload);
  }
}
