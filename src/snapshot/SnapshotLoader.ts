import fs from 'fs'
import { DiagnosticRecord, ProjectRun, RunOutput, SnapshotFileSchema } from '../contracts'
import { createOwnedRecord } from './DiagnosticRecord'
import { SnapshotFormatError, formatZodIssues } from './errors'
import { Snapshot, UNKNOWN_COMMIT, createSnapshot } from './Snapshot'
import { debugLog } from '../logging/debugLog'

export interface SnapshotFilters {
  // Diagnostics whose message contains any of these are dropped
  messages?: readonly string[]
  // Projects for which this returns true are dropped entirely
  ignoreProject?: (project: string) => boolean
}

export interface LoadSnapshotOptions {
  name?: string
  filters?: SnapshotFilters
  // Label used in error messages
  source?: string
}

/**
 * Resolve the checker commit shared by all outputs of a run file.
 */
export function resolveCommit(outputs: readonly RunOutput[], source: string): string {
  const commits = new Set<string>()
  for (const output of outputs) {
    if (output.checker_commit !== undefined && output.checker_commit !== UNKNOWN_COMMIT) {
      commits.add(output.checker_commit)
    }
  }

  if (commits.size > 1) {
    throw new SnapshotFormatError(
      source,
      `expected diagnostics from a single checker commit, found ${Array.from(commits).join(', ')}`
    )
  }

  const [commit] = commits
  return commit ?? UNKNOWN_COMMIT
}

/**
 * Validate already parsed run-file JSON and build a snapshot from it.
 * Fails on the first malformed diagnostic; no partial snapshot is returned.
 */
export function parseSnapshot(data: unknown, options: LoadSnapshotOptions = {}): Snapshot {
  const source = options.source ?? '<input>'
  const parsed = SnapshotFileSchema.safeParse(data)
  if (!parsed.success) {
    throw new SnapshotFormatError(source, formatZodIssues(parsed.error).join('; '))
  }

  const ignoreProject = options.filters?.ignoreProject ?? (() => false)
  const messageFilters = options.filters?.messages ?? []
  const outputs = parsed.data.outputs.filter((output) => !ignoreProject(output.project))

  const records: DiagnosticRecord[] = []
  const runs: ProjectRun[] = []
  let filtered = 0

  for (const output of outputs) {
    runs.push(toProjectRun(output))

    output.diagnostics.forEach((raw, index) => {
      const record = createOwnedRecord(raw, output, index)
      if (messageFilters.some((filter) => record.message.includes(filter))) {
        filtered++
        return
      }
      records.push(record)
    })
  }

  debugLog({
    event: 'snapshot_parsed',
    source,
    outputCount: outputs.length,
    ignoredProjects: parsed.data.outputs.length - outputs.length,
    filteredDiagnostics: filtered,
  })

  return createSnapshot({
    name: options.name,
    commit: resolveCommit(outputs, source),
    records,
    runs,
  })
}

/**
 * Read a run file from disk and build a snapshot from it.
 */
export function loadSnapshot(filePath: string, options: LoadSnapshotOptions = {}): Snapshot {
  const source = options.source ?? filePath
  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new SnapshotFormatError(source, `invalid JSON (${error.message})`)
    }
    throw error
  }
  return parseSnapshot(data, { ...options, source })
}

const toProjectRun = (output: RunOutput): ProjectRun => ({
  project: output.project,
  ...(output.project_location !== undefined ? { project_location: output.project_location } : {}),
  ...(output.checker_commit !== undefined ? { checker_commit: output.checker_commit } : {}),
  ...(output.time_s !== undefined ? { time_s: output.time_s } : {}),
  ...(output.return_code !== undefined ? { return_code: output.return_code } : {}),
})
