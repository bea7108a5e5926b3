export type DiagnosticLevel = 'error' | 'warning'

export interface DiagnosticRecord {
  readonly project: string
  readonly project_location?: string
  readonly path: string
  readonly line: number
  readonly column: number
  readonly level: DiagnosticLevel
  readonly lint_name: string
  readonly message: string
  readonly github_ref?: string
}

// Per-project metadata of a single checker run
export interface ProjectRun {
  readonly project: string
  readonly project_location?: string
  readonly checker_commit?: string
  // null means the run did not finish; undefined means it was never recorded
  readonly time_s?: number | null
  readonly return_code?: number | null
}

export interface ProjectDiagnostics {
  readonly project: string
  readonly project_location?: string
  readonly diagnostics: readonly DiagnosticRecord[]
}

export interface FileDiagnostics {
  readonly path: string
  readonly diagnostics: readonly DiagnosticRecord[]
}

export interface LineDiagnostics {
  readonly line: number
  readonly diagnostics: readonly DiagnosticRecord[]
}

export interface TextDiff {
  readonly old: DiagnosticRecord
  readonly new: DiagnosticRecord
}

export interface LineMatch {
  readonly text_diffs: readonly TextDiff[]
  readonly removed: readonly DiagnosticRecord[]
  readonly added: readonly DiagnosticRecord[]
}

export interface ModifiedLine extends LineMatch {
  readonly line: number
}

export interface LineDiffs {
  readonly added_lines: readonly LineDiagnostics[]
  readonly removed_lines: readonly LineDiagnostics[]
  readonly modified_lines: readonly ModifiedLine[]
}

export interface ModifiedFile {
  readonly path: string
  readonly diffs: LineDiffs
}

export interface FileDiffs {
  readonly added_files: readonly FileDiagnostics[]
  readonly removed_files: readonly FileDiagnostics[]
  readonly modified_files: readonly ModifiedFile[]
}

export interface ModifiedProject {
  readonly project: string
  readonly project_location?: string
  readonly diffs: FileDiffs
}

export interface DiffTree {
  readonly added_projects: readonly ProjectDiagnostics[]
  readonly removed_projects: readonly ProjectDiagnostics[]
  readonly modified_projects: readonly ModifiedProject[]
}

export interface ChangeCounts {
  readonly removed: number
  readonly added: number
  readonly changed: number
}

export interface LintStatistics extends ChangeCounts {
  readonly lint_name: string
}

export interface StatisticsTable {
  readonly rows: readonly LintStatistics[]
  readonly total: ChangeCounts
}

export type RunStatus = 'success' | 'timeout' | 'abnormal exit' | 'unknown'

export interface FailedProject {
  readonly project: string
  readonly project_location?: string
  readonly old_status: RunStatus
  readonly new_status: RunStatus
  readonly old_return_code: number | null
  readonly new_return_code: number | null
}

export interface SnapshotSummary {
  readonly name: string
  readonly commit: string
  readonly snapshot_id: string
  readonly diagnostics: number
}

export interface DiffMetadata {
  readonly old: SnapshotSummary
  readonly new: SnapshotSummary
  readonly checker_repo_url?: string
}

export interface DiffReport {
  readonly metadata: DiffMetadata
  readonly diffs: DiffTree
  readonly statistics: StatisticsTable
  readonly failed_projects: readonly FailedProject[]
}

export type TimingFailure = 'both_failed' | 'old_failed' | 'new_failed'

export interface TimingRow {
  readonly project: string
  readonly old_time: number | null
  readonly new_time: number | null
  readonly old_return_code: number | null
  readonly new_return_code: number | null
  readonly factor: number
  readonly failure_type: TimingFailure | null
  readonly old_is_timeout: boolean
  readonly new_is_timeout: boolean
  readonly old_is_abnormal: boolean
  readonly new_is_abnormal: boolean
}

export interface TimingSummary {
  readonly speedups: number
  readonly slowdowns: number
  readonly timeouts: number
  readonly abnormal_exits: number
  readonly avg_factor: number
}

export interface TimingReport {
  readonly metadata: DiffMetadata
  readonly rows: readonly TimingRow[]
  readonly summary: TimingSummary
}

export interface NamedCount {
  readonly name: string
  readonly count: number
}

export interface EcosystemReport {
  readonly name: string
  readonly commit: string
  readonly diagnostics: readonly DiagnosticRecord[]
  readonly projects: readonly NamedCount[]
  readonly lints: readonly NamedCount[]
  readonly levels: readonly NamedCount[]
  readonly skipped_projects: readonly NamedCount[]
  readonly total: number
}

export interface DiffConfig {
  filters: {
    messages: string[]
    projects: string[]
  }
  report: {
    format: 'markdown' | 'json'
    maxDiagnosticsPerProject: number
  }
  runs: {
    successReturnCodes: number[]
  }
  timing: {
    speedupFactor: number
    slowdownFactor: number
  }
  checkerRepoUrl?: string
}
