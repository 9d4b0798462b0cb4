import { anyCell, either, maybeRef } from "../../codec/tlb";

/** `custom_payload:(Maybe ^Cell)` */
export const customPayloadCodec = maybeRef(anyCell);

/** `forward_payload:(Either Cell ^Cell)` */
export const forwardPayloadCodec = either(anyCell);
