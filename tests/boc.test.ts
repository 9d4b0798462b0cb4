import { describe, it, expect } from "vitest";
import { beginCell } from "@ton/core";
import { parseBocHex, serializeBoc, serializeBocHex } from "../src";
import { BURN_MSG, TRANSFER_NOTIFICATION_MSG } from "./helpers/fixtures";
import { codecErrorKind } from "./helpers/messages";

describe("boc helpers", () => {
  it("re-serializes fixtures byte for byte", () => {
    for (const hex of [BURN_MSG, TRANSFER_NOTIFICATION_MSG]) {
      expect(serializeBocHex(parseBocHex(hex))).toBe(hex);
    }
  });

  it("writes neither index nor crc", () => {
    const boc = serializeBoc(beginCell().storeUint(1, 8).endCell());
    expect(boc.subarray(0, 5).toString("hex")).toBe("b5ee9c7201");
  });

  it("reports garbage as Malformed", () => {
    expect(codecErrorKind(() => parseBocHex("deadbeef"))).toBe("Malformed");
    expect(codecErrorKind(() => parseBocHex("abc"))).toBe("Malformed");
  });
});
