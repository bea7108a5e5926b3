import { z } from 'zod'

export const DiagnosticLevelSchema = z.enum(['error', 'warning'])

// A diagnostic as it appears inside a run output
export const DiagnosticSchema = z.object({
  level: DiagnosticLevelSchema,
  lint_name: z.string().min(1),
  path: z.string(),
  line: z.number().int().min(1),
  column: z.number().int().nonnegative(),
  message: z.string(),
  github_ref: z.string().optional(),
})

// A flat diagnostic that carries its own project
export const DiagnosticRecordSchema = DiagnosticSchema.extend({
  project: z.string().min(1),
  project_location: z.string().optional(),
})

// Older run files name the checker commit ty_commit
const withCheckerCommit = (raw: unknown): unknown => {
  if (typeof raw !== 'object' || raw === null || 'checker_commit' in raw || !('ty_commit' in raw)) {
    return raw
  }
  return { ...raw, checker_commit: Reflect.get(raw, 'ty_commit') }
}

// Diagnostics are validated one by one so errors can point at the record
export const RunOutputSchema = z.preprocess(withCheckerCommit, z.object({
  project: z.string().min(1),
  project_location: z.string().optional(),
  checker_commit: z.string().optional(),
  diagnostics: z.array(z.unknown()).default([]),
  time_s: z.number().nonnegative().nullable().optional(),
  return_code: z.number().int().nullable().optional(),
}))

export const SnapshotFileSchema = z.object({
  outputs: z.array(RunOutputSchema),
})

// Config schema
export const DiffConfigSchema = z.object({
  filters: z.object({
    messages: z.array(z.string()).default([]),
    projects: z.array(z.string()).default([]),
  }).default({
    messages: [],
    projects: [],
  }),
  report: z.object({
    format: z.enum(['markdown', 'json']).default('markdown'),
    maxDiagnosticsPerProject: z.number().int().positive().default(1000),
  }).default({
    format: 'markdown',
    maxDiagnosticsPerProject: 1000,
  }),
  runs: z.object({
    successReturnCodes: z.array(z.number().int()).default([0, 1]),
  }).default({
    successReturnCodes: [0, 1],
  }),
  timing: z.object({
    speedupFactor: z.number().positive().default(0.9),
    slowdownFactor: z.number().positive().default(1.1),
  }).default({
    speedupFactor: 0.9,
    slowdownFactor: 1.1,
  }),
  checkerRepoUrl: z.string().url().optional(),
})

export type RunOutput = z.infer<typeof RunOutputSchema>
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>
