import { assertValid, opcodeSchema } from "../model/validation";

// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Opcode = Brand<number, "Opcode">;

export const asOpcode = (n: number): Opcode => {
  assertValid(opcodeSchema, n, "opcode");
  return n as Opcode;
};

export const formatOpcode = (op: number): string =>
  "0x" + (op >>> 0).toString(16).padStart(8, "0");
