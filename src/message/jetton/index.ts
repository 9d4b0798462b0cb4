export * from "./opcodes";
export * from "./fields";
export { JettonBurnMessage } from "./burn";
export { JettonBurnNotificationMessage } from "./burnNotification";
export { JettonExcessesMessage } from "./excesses";
export { JettonInternalTransferMessage } from "./internalTransfer";
export { JettonTransferMessage } from "./transfer";
export { JettonTransferNotificationMessage } from "./transferNotification";
