export const DEFAULT_PARAM_DIR = "/data/lotus/folder/filecoin-proof-parameters";
export const DEFAULT_GATEWAY_URL = "https://proofs.filecoin.io/ipfs/";

/** Environment variable names read by `loadConfig`. */
export const ENV = {
  paramDir: "FIL_PROOFS_PARAMETER_CACHE",
  gateway: "IPFS_GATEWAY",
  trustParams: "TRUST_PARAMS",
  logLevel: "LOG_LEVEL",
  logPretty: "LOG_PRETTY",
} as const;
