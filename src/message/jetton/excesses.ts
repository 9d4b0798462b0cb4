import type { Cell } from "@ton/core";
import {
  beginMessage,
  closeMessage,
  endMessage,
  openMessage,
  type TonMessage,
} from "../message";
import { JETTON_EXCESSES } from "./opcodes";

// excesses#d53276db query_id:uint64 = InternalMsgBody;
export class JettonExcessesMessage implements TonMessage {
  static readonly opcode = JETTON_EXCESSES;
  readonly opcode = JETTON_EXCESSES;

  queryId = 0n;

  withQueryId(queryId: bigint): this {
    this.queryId = queryId;
    return this;
  }

  build(): Cell {
    return endMessage(beginMessage(this.opcode, this.queryId));
  }

  static parse(cell: Cell): JettonExcessesMessage {
    const { slice, queryId } = openMessage(cell, JETTON_EXCESSES);
    closeMessage(slice, "excesses");
    return new JettonExcessesMessage().withQueryId(queryId);
  }
}
