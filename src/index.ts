// SBOM completeness check: public library surface

export { checkSbom, checkDocument } from "./check.js";
export {
  checkCompleteness,
  checkCreationInfo,
  checkPrimaryPackage,
  checkPackage,
  checkFile,
  isCompletenessDiagnostic,
  COMPLETENESS_EXCEPTION,
  COMPLETENESS_SPDX_VERSIONS,
  COMPLETENESS_STAGES,
} from "./completeness.js";
export {
  deserialize,
  parseDict,
  parseFile,
  parseActor,
  parseLicenseValue,
  formatForPath,
  SpdxParseError,
} from "./parser.js";
export { validateDocument, isValidLicenseExpression, SUPPORTED_SPDX_VERSIONS } from "./validator.js";
export {
  CSV_HEADER,
  checked,
  parseFailure,
  hasFindings,
  toRecord,
  toRecords,
  toCsvRows,
} from "./result.js";
export {
  flattenResult,
  flattenResults,
  formatConsoleReport,
  toCsv,
  writeCsvReports,
  writeJsonReport,
} from "./report.js";
export { runDirectory, isSpdxFileName, SPDX_EXTENSIONS } from "./runner.js";
export { createSbomCheckServer } from "./server.js";
export { NO_ASSERTION, NONE, isLicenseAsserted, hasSupplier } from "./model.js";
export type {
  Actor,
  ActorType,
  CheckResult,
  Checksum,
  CreationInfo,
  Diagnostic,
  DiagnosticRecord,
  ElementType,
  LicenseValue,
  Relationship,
  SpdxDocument,
  SpdxFile,
  SpdxPackage,
  SupplierValue,
} from "./model.js";
export type { CheckOptions } from "./check.js";
export type { CompletenessStage, StageOutcome } from "./completeness.js";
export type { DocumentFormat } from "./parser.js";
export type { FlattenedResult } from "./report.js";
export type { RunOptions } from "./runner.js";
export type { SbomCheckServerOptions, SbomCheckMcpServer } from "./server.js";
