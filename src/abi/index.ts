export { AbiRegistry, abiSourceForChain, CHAIN_ID_NETNA, CHAIN_ID_TESTNET } from "./registry";
export { abiDataSchema, moveFunctionSchema } from "./types";
export type { AbiData, MoveFunction, MoveFunctionId } from "./types";
