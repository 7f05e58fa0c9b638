export { closePool, getPool, query, queryableFor, withTransaction, type Queryable } from "./postgres/client";
export { checkDatabaseHealth } from "./postgres/health";
export {
  auditDatabaseIntegrity,
  buildReferenceChecks,
  formatIntegrityReport,
  type IntegrityReport,
  type OrphanReference,
} from "./postgres/integrity";
export {
  COLUMN_CHECK_STEP,
  DESTRUCTIVE_CONFIRMATION,
  listPublicTables,
  provisionSchema,
  ProvisioningError,
  resetAndProvisionSchema,
  type ProvisionOptions,
  type ProvisionResult,
} from "./postgres/provisioner";
export { loadSampleData } from "./postgres/sample_data";
export {
  FRAGO_SEQUENCE,
  nextFragoNumber,
  nextReportNumber,
  nextSequenceNumber,
  peekSequenceNumber,
  reportSequence,
  type SequenceKey,
} from "./postgres/sequences";
