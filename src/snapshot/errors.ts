import { z } from 'zod'

export class DiagDiffError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export interface MalformedRecordLocation {
  project?: string
  path?: string
  index?: number
}

/**
 * Raised at ingestion when a diagnostic is missing a required field or
 * carries an invalid value. The message names the project and file so the
 * upstream diagnostic source can be fixed.
 */
export class MalformedRecordError extends DiagDiffError {
  readonly project?: string
  readonly path?: string
  readonly index?: number
  readonly issues: string[]

  constructor(location: MalformedRecordLocation, issues: string[]) {
    super(MalformedRecordError.describe(location, issues))
    this.project = location.project
    this.path = location.path
    this.index = location.index
    this.issues = issues
  }

  static fromZodError(location: MalformedRecordLocation, error: z.ZodError): MalformedRecordError {
    return new MalformedRecordError(location, formatZodIssues(error))
  }

  private static describe(location: MalformedRecordLocation, issues: string[]): string {
    const where: string[] = []
    if (location.project !== undefined) where.push(`project "${location.project}"`)
    if (location.path !== undefined) where.push(`file "${location.path}"`)
    if (location.index !== undefined) where.push(`diagnostic #${location.index}`)

    const prefix = where.length > 0 ? `Malformed diagnostic in ${where.join(', ')}` : 'Malformed diagnostic'
    return `${prefix}: ${issues.join('; ')}`
  }
}

export class SnapshotFormatError extends DiagDiffError {
  constructor(readonly source: string, detail: string) {
    super(`Invalid snapshot ${source}: ${detail}`)
  }
}

export const formatZodIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
