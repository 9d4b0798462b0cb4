import type { Cell } from "@ton/core";
import { CodecError } from "../core/errors";
import { loggerFromEnv } from "../config";
import type { ILogger } from "../logging";
import { formatOpcode } from "../types/brands";
import {
  JettonBurnMessage,
  JettonBurnNotificationMessage,
  JettonExcessesMessage,
  JettonInternalTransferMessage,
  JettonTransferMessage,
  JettonTransferNotificationMessage,
} from "./jetton";
import { peekOpcode, type TonMessage, type TonMessageType } from "./message";

/**
 * Decodes message bodies of unknown kind by their leading opcode.
 */
export class MessageRegistry {
  private readonly types = new Map<number, TonMessageType>();

  constructor(private readonly log: ILogger = loggerFromEnv()) {}

  register(type: TonMessageType): this {
    const existing = this.types.get(type.opcode);
    if (existing) {
      throw new Error(
        `opcode ${formatOpcode(type.opcode)} already registered by ${existing.name}`,
      );
    }
    this.types.set(type.opcode, type);
    return this;
  }

  has(opcode: number): boolean {
    return this.types.has(opcode);
  }

  lookup(opcode: number): TonMessageType | undefined {
    return this.types.get(opcode);
  }

  parse(cell: Cell): TonMessage {
    const opcode = peekOpcode(cell);
    const type = this.types.get(opcode);
    if (!type) {
      this.log.warn({ opcode: formatOpcode(opcode) }, "no codec for opcode");
      throw new CodecError(
        "SchemaMismatch",
        `no message kind registered for opcode ${formatOpcode(opcode)}`,
      );
    }
    this.log.debug({ opcode: formatOpcode(opcode), kind: type.name }, "dispatch");
    return type.parse(cell);
  }
}

/** Registry holding every TEP-74 jetton message kind. */
export const jettonRegistry = (log?: ILogger): MessageRegistry =>
  new MessageRegistry(log)
    .register(JettonTransferMessage)
    .register(JettonTransferNotificationMessage)
    .register(JettonInternalTransferMessage)
    .register(JettonExcessesMessage)
    .register(JettonBurnMessage)
    .register(JettonBurnNotificationMessage);
