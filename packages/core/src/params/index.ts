export { VerificationCache } from "./verification-cache.js";
export {
  computeDigestPrefix,
  digestPrefixOf,
  DIGEST_ALGORITHM,
  DIGEST_PREFIX_BYTES,
} from "./digest.js";
export {
  createVerifier,
  type Verifier,
  type VerifierOptions,
  type VerifyResult,
} from "./verifier.js";
export { createDownloadGate, type DownloadGate } from "./gate.js";
export {
  createLogProgressSink,
  createProgressCounter,
  noopProgressSink,
  type ProgressSink,
  type ProgressSinkFactory,
} from "./progress.js";
export {
  contentUrl,
  createDownloader,
  type Downloader,
  type DownloaderOptions,
} from "./downloader.js";
export { isInScope, parseManifest, PARAMS_SUFFIX } from "./manifest.js";
export {
  createParamFetcher,
  type ParamFetcher,
  type ParamFetcherOptions,
  type ReconcileOutcome,
} from "./fetcher.js";
