export * from './contracts'
export { DiagDiffError, MalformedRecordError, SnapshotFormatError } from './snapshot/errors'
export { createDiagnosticRecord, createDiagnosticRecords } from './snapshot/DiagnosticRecord'
export { SnapshotIndex } from './snapshot/SnapshotIndex'
export type { FileIndex, ProjectIndex } from './snapshot/SnapshotIndex'
export { createSnapshot, shortCommit, UNKNOWN_COMMIT } from './snapshot/Snapshot'
export type { Snapshot, SnapshotInit } from './snapshot/Snapshot'
export { loadSnapshot, parseSnapshot } from './snapshot/SnapshotLoader'
export type { LoadSnapshotOptions, SnapshotFilters } from './snapshot/SnapshotLoader'
export { matchLine } from './diff/LineMatcher'
export { buildDiffTree, isEmptyDiffTree } from './diff/DiffBuilder'
export { aggregateStatistics } from './diff/StatisticsAggregator'
export { classifyRun, findFailedProjects } from './diff/RunHealth'
export { compareTimings, summarizeTimings } from './diff/TimingComparison'
export { compareSnapshots, compareRunTimes } from './diff/compareSnapshots'
export type { CompareOptions } from './diff/compareSnapshots'
export { buildEcosystemReport } from './report/EcosystemReport'
export { ConfigLoader } from './config/ConfigLoader'
export * from './rendering'
