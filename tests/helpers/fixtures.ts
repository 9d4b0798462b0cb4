import { Address, beginCell, BitString, type Cell } from "@ton/core";

/* ── burn ────────────────────────────────────────────────── */

// response_destination set, custom_payload flag = 0
export const BURN_MSG =
  "b5ee9c72010101010033000062595f07bc0000009b5946deef3080f21800b026e71919f2c839f639f078d9ee6bc9d7592ebde557edf03661141c7c5f2ea2";
export const BURN_QUERY_ID = 667217747695n;
export const BURN_AMOUNT = 528161n;
export const BURN_RESPONSE = "EQBYE3OMjPlkHPsc-Dxs9zXk66yXXvKr9vgbMIoOPi-XUa-f";

export const BURN_SMALL_QID_MSG =
  "b5ee9c72010101010035000066595f07bc0000000000000001545d964b800800cd324c114b03f846373734c74b3c3287e1a8c2c732b5ea563a17c6276ef4af30";
export const BURN_SMALL_QID_AMOUNT = 300000000000n;
export const BURN_SMALL_QID_RESPONSE = "EQBmmSYIpYH8IxubmmOlnhlD8NRhY5la9SsdC-MTt3pXmOSI";

/* ── transfer_notification ───────────────────────────────── */

// 886-bit forward payload, stored by reference
export const TRANSFER_NOTIFICATION_MSG =
  "b5ee9c720101020100a60001647362d09c000000d2c7ceef23401312d008003be20895401cd8539741eb7815d5e63b3429014018d7e5f7800de16a984f27730100dd25938561800f2465b65c76b1b562f32423676970b431319419d5f45ffd2eeb2155ce6ab7eacc78ee0250ef0300077c4112a8039b0a72e83d6f02babcc766852028031afcbef001bc2d5309e4ee700257a672371a90e149b7d25864dbfd44827cc1e8a30df1b1e0c4338502ade2ad96";
export const TRANSFER_NOTIFICATION_QUERY_ID = 905295359779n;
export const TRANSFER_NOTIFICATION_AMOUNT = 20000000n;
export const TRANSFER_NOTIFICATION_SENDER =
  "EQAd8QRKoA5sKcug9bwK6vMdmhSAoAxr8vvABvC1TCeTude5";
export const TRANSFER_NOTIFICATION_PAYLOAD_HEX =
  "25938561800f2465b65c76b1b562f32423676970b431319419d5f45ffd2eeb2155ce6ab7eacc78ee0250ef0300077c4112a8039b0a72e83d6f02babcc766852028031afcbef001bc2d5309e4ee700257a672371a90e149b7d25864dbfd44827cc1e8a30df1b1e0c4338502ade2ad94";
export const TRANSFER_NOTIFICATION_PAYLOAD_BITS = 886;

export const cellOfBits = (hex: string, bits: number): Cell =>
  beginCell()
    .storeBits(new BitString(Buffer.from(hex, "hex"), 0, bits))
    .endCell();

export const transferNotificationPayload = (): Cell =>
  cellOfBits(TRANSFER_NOTIFICATION_PAYLOAD_HEX, TRANSFER_NOTIFICATION_PAYLOAD_BITS);

export const addr = (friendly: string): Address => Address.parse(friendly);
