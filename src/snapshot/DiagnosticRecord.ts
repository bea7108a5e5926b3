import { DiagnosticRecord, DiagnosticRecordSchema, DiagnosticSchema } from '../contracts'
import { MalformedRecordError } from './errors'

export interface RecordOwner {
  project: string
  project_location?: string
}

const readString = (raw: unknown, key: 'path' | 'project'): string | undefined => {
  if (typeof raw === 'object' && raw !== null && key in raw) {
    const value: unknown = Reflect.get(raw, key)
    return typeof value === 'string' ? value : undefined
  }
  return undefined
}

const freezeRecord = (record: DiagnosticRecord): DiagnosticRecord => {
  // Optional fields are left out rather than set to undefined so records
  // serialize the same way they were read
  return Object.freeze({
    project: record.project,
    ...(record.project_location !== undefined ? { project_location: record.project_location } : {}),
    path: record.path,
    line: record.line,
    column: record.column,
    level: record.level,
    lint_name: record.lint_name,
    message: record.message,
    ...(record.github_ref !== undefined ? { github_ref: record.github_ref } : {}),
  })
}

/**
 * Validate a flat diagnostic that names its own project.
 */
export function createDiagnosticRecord(raw: unknown, index?: number): DiagnosticRecord {
  const parsed = DiagnosticRecordSchema.safeParse(raw)
  if (!parsed.success) {
    throw MalformedRecordError.fromZodError(
      { project: readString(raw, 'project'), path: readString(raw, 'path'), index },
      parsed.error
    )
  }
  return freezeRecord(parsed.data)
}

/**
 * Validate a diagnostic nested in a run output; project fields come from
 * the enclosing output.
 */
export function createOwnedRecord(raw: unknown, owner: RecordOwner, index?: number): DiagnosticRecord {
  const parsed = DiagnosticSchema.safeParse(raw)
  if (!parsed.success) {
    throw MalformedRecordError.fromZodError(
      { project: owner.project, path: readString(raw, 'path'), index },
      parsed.error
    )
  }
  return freezeRecord({
    ...parsed.data,
    project: owner.project,
    project_location: owner.project_location,
  })
}

/**
 * Validate a whole list, failing on the first malformed record.
 */
export function createDiagnosticRecords(raw: readonly unknown[]): DiagnosticRecord[] {
  return raw.map((item, index) => createDiagnosticRecord(item, index))
}
