import { asOpcode } from "../../types/brands";

// TEP-74 jetton standard
export const JETTON_TRANSFER = asOpcode(0x0f8a7ea5);
export const JETTON_TRANSFER_NOTIFICATION = asOpcode(0x7362d09c);
export const JETTON_INTERNAL_TRANSFER = asOpcode(0x178d4519);
export const JETTON_EXCESSES = asOpcode(0xd53276db);
export const JETTON_BURN = asOpcode(0x595f07bc);
export const JETTON_BURN_NOTIFICATION = asOpcode(0x7bdd97de);
