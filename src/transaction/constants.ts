/** Sequence number carried by every orderless transaction */
export const ORDERLESS_SEQUENCE_NUMBER = 0xdeadbeefn;

/** Gas ceiling for the first build, and floor after simulation */
export const DEFAULT_MAX_GAS_AMOUNT = 200_000;

/** Absolute gas ceiling after simulation */
export const MAX_GAS_UNITS_LIMIT = 2_000_000;

/** Gas unit price assumed when the node omits its estimate */
export const DEFAULT_GAS_ESTIMATE = 100;

export const DEFAULT_TXN_EXPIRY_SECS = 20;

export const DEFAULT_POLL_INTERVAL_MS = 1_000;

export const DEFAULT_TXN_TIMEOUT_MS = 30_000;

export const SIGNED_TRANSACTION_CONTENT_TYPE = "application/x.aptos.signed_transaction+bcs";
