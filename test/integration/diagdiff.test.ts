import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { diffCommand, reportCommand, timingCommand } from '../../src/commands'
import { createProgram } from '../../src/cli/diagdiff'
import { DiffReport, TimingReport } from '../../src/contracts'

const OLD_COMMIT = '1111111aaaaaaaaa'
const NEW_COMMIT = 'feedface00000000'

const diag = (lint_name: string, path: string, line: number, message: string) => ({
  level: 'error',
  lint_name,
  path,
  line,
  column: 0,
  message,
})

const oldRun = {
  outputs: [
    {
      project: 'alpha',
      checker_commit: OLD_COMMIT,
      time_s: 2,
      return_code: 0,
      diagnostics: [diag('X', 'a.py', 3, 'm1'), diag('Y', 'a.py', 7, 'gone')],
    },
    { project: 'beta', checker_commit: OLD_COMMIT, time_s: 1, return_code: 0, diagnostics: [diag('Z', 'b.py', 1, 'z')] },
    { project: 'crashy', checker_commit: OLD_COMMIT, time_s: 1, return_code: 0, diagnostics: [diag('X', 'c.py', 1, 'c')] },
    { project: 'vendor/skip', checker_commit: OLD_COMMIT, diagnostics: [diag('X', 'v.py', 1, 'v')] },
  ],
}

const newRun = {
  outputs: [
    { project: 'alpha', checker_commit: NEW_COMMIT, time_s: 4, return_code: 0, diagnostics: [diag('X', 'a.py', 3, 'm2')] },
    {
      project: 'crashy',
      checker_commit: NEW_COMMIT,
      time_s: 1,
      return_code: 101,
      diagnostics: [diag('X', 'c.py', 1, 'different')],
    },
    {
      project: 'gamma',
      checker_commit: NEW_COMMIT,
      time_s: 1,
      return_code: 0,
      diagnostics: [diag('W', 'g.py', 2, 'new warning'), diag('W', 'g.py', 9, 'in generated code')],
    },
    { project: 'vendor/skip', checker_commit: NEW_COMMIT, diagnostics: [] },
  ],
}

describe('diagdiff integration', () => {
  let tempDir: string
  let oldPath: string
  let newPath: string
  let configPath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'diagdiff-'))
    oldPath = path.join(tempDir, 'old.json')
    newPath = path.join(tempDir, 'new.json')
    configPath = path.join(tempDir, 'diagdiff.config.json')

    fs.writeFileSync(oldPath, JSON.stringify(oldRun))
    fs.writeFileSync(newPath, JSON.stringify(newRun))
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        filters: { messages: ['generated'], projects: ['vendor/*'] },
        report: { format: 'json' },
      })
    )
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('diff', () => {
    it('should diff two run files with config filters applied', async () => {
      const result = await diffCommand(oldPath, newPath, { config: configPath, oldName: 'baseline' })
      const report: DiffReport = JSON.parse(result.text)

      expect(result.outputPath).toBeUndefined()
      expect(report.metadata.old).toMatchObject({ name: 'baseline', commit: OLD_COMMIT, diagnostics: 4 })
      expect(report.metadata.new).toMatchObject({ name: 'feedfac', commit: NEW_COMMIT, diagnostics: 3 })
      expect(report.statistics).toEqual({
        rows: [
          { lint_name: 'W', removed: 0, added: 1, changed: 0 },
          { lint_name: 'X', removed: 0, added: 0, changed: 1 },
          { lint_name: 'Y', removed: 1, added: 0, changed: 0 },
          { lint_name: 'Z', removed: 1, added: 0, changed: 0 },
        ],
        total: { removed: 2, added: 1, changed: 1 },
      })
      expect(report.failed_projects).toEqual([
        { project: 'crashy', old_status: 'success', new_status: 'abnormal exit', old_return_code: 0, new_return_code: 101 },
      ])
      expect(report.diffs.removed_projects.map((project) => project.project)).toEqual(['beta'])
      expect(report.diffs.added_projects.map((project) => project.project)).toEqual(['gamma'])
      expect(report.diffs.modified_projects.map((project) => project.project)).toEqual(['alpha'])
    })

    it('should let the format option override the config', async () => {
      const result = await diffCommand(oldPath, newPath, { config: configPath, format: 'markdown' })

      expect(result.text.split('\n')[0]).toBe('# Diagnostic diff: 1111111 → feedfac')
    })

    it('should reject unknown formats', async () => {
      await expect(diffCommand(oldPath, newPath, { config: configPath, format: 'html' })).rejects.toThrow(
        'Unknown format "html". Expected one of: markdown, json'
      )
    })

    it('should fail on a malformed run file', async () => {
      fs.writeFileSync(newPath, JSON.stringify({ outputs: [{ project: 'alpha', diagnostics: [{ level: 'error' }] }] }))

      await expect(diffCommand(oldPath, newPath, { config: configPath })).rejects.toThrow(
        /^Malformed diagnostic in project "alpha", diagnostic #0: /
      )
    })
  })

  describe('timing', () => {
    it('should compare run times of projects present in both files', async () => {
      const result = await timingCommand(oldPath, newPath, { config: configPath })
      const report: TimingReport = JSON.parse(result.text)

      expect(report.rows.map((row) => row.project)).toEqual(['crashy', 'alpha'])
      expect(report.rows[1].factor).toBe(2)
      expect(result.text).toContain('"factor": "Infinity"')
      expect(report.summary).toEqual({ speedups: 0, slowdowns: 1, timeouts: 0, abnormal_exits: 1, avg_factor: 2 })
    })
  })

  describe('report', () => {
    it('should write the ecosystem report to the output file', async () => {
      const outputPath = path.join(tempDir, 'out', 'report.md')

      const result = await reportCommand(newPath, { config: configPath, format: 'markdown', output: outputPath })

      expect(result.outputPath).toBe(outputPath)
      const lines = fs.readFileSync(outputPath, 'utf-8').split('\n')
      expect(lines[0]).toBe('# Ecosystem report: feedfac')
      expect(lines).toContain(`Checker commit: ${NEW_COMMIT}. 3 diagnostics.`)
    })
  })

  describe('cli', () => {
    it('should run the diff subcommand and write its output', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {})
      const outputPath = path.join(tempDir, 'diff.json')

      await createProgram().parseAsync([
        'node',
        'diagdiff',
        'diff',
        oldPath,
        newPath,
        '--old-name',
        'baseline',
        '--config',
        configPath,
        '--output',
        outputPath,
      ])

      const report: DiffReport = JSON.parse(fs.readFileSync(outputPath, 'utf-8'))
      expect(report.metadata.old.name).toBe('baseline')
      expect(report.statistics.total).toEqual({ removed: 2, added: 1, changed: 1 })
    })
  })
})
