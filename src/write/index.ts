export { WriteClient, extractOrderIdFromTransaction, extractVaultAddressFromCreateTx } from "./client";
export * from "./types";
