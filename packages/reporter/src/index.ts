/**
 * @roundfeed/reporter — Off-chain signing for roundfeed oracles.
 *
 * - Sign and verify reports against an aggregator's report hash
 * - Pack signed reports into hex blobs for transport
 * - Assemble collected signatures into a submission batch
 */

export { Reporter } from "./reporter.js";
export type { ReporterConfig, Observation } from "./reporter.js";

export {
  loadAccount,
  reporterAddress,
  signReport,
  signWithAccount,
  recoverReportSigner,
  packSignedReport,
  unpackSignedReport,
  assembleBatch,
} from "./report.js";
export { buildReportHash } from "@roundfeed/aggregator";

export type {
  PrivateKey,
  ReportPayload,
  ReportSignature,
  SignatureParts,
  SignedReport,
  ReportErrorCode,
} from "./types.js";
export { ReportError, SIGNATURE_BYTES } from "./types.js";
