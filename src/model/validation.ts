import {
  bigint,
  integer,
  maxValue,
  minValue,
  number,
  pipe,
  safeParse,
  type GenericSchema,
} from "valibot";
import { CodecError } from "../core/errors";

export const MAX_U32 = 2 ** 32 - 1;
export const MAX_U64 = 2n ** 64n - 1n;
/** VarUInteger 16 carries at most 15 magnitude bytes. */
export const MAX_COINS = 2n ** 120n - 1n;

export const opcodeSchema = pipe(number(), integer(), minValue(0), maxValue(MAX_U32));
export const queryIdSchema = pipe(bigint(), minValue(0n), maxValue(MAX_U64));
export const coinsSchema = pipe(bigint(), minValue(0n), maxValue(MAX_COINS));

export const uintSchema = (bits: number) =>
  pipe(bigint(), minValue(0n), maxValue((1n << BigInt(bits)) - 1n));

/** Throws ValueOutOfRange naming `field` when `value` fails `schema`. */
export function assertValid<T>(
  schema: GenericSchema<unknown, T>,
  value: unknown,
  field: string,
): T {
  const parsed = safeParse(schema, value);
  if (!parsed.success) {
    throw new CodecError(
      "ValueOutOfRange",
      `${field}: ${parsed.issues[0].message}`,
    );
  }
  return parsed.output;
}
