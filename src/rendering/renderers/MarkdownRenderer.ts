import { BaseRenderer } from './BaseRenderer'
import {
  DiagnosticRecord,
  DiffMetadata,
  DiffReport,
  EcosystemReport,
  FileDiagnostics,
  ModifiedFile,
  ModifiedProject,
  NamedCount,
  ProjectDiagnostics,
  SnapshotSummary,
  TimingReport,
  TimingRow,
} from '../../contracts'

type LineEntry = { line: number; items: string[] }

/**
 * Renders reports as GitHub-flavored Markdown
 */
export class MarkdownRenderer extends BaseRenderer {
  readonly format = 'markdown' as const
  readonly extension = '.md'

  renderDiff(report: DiffReport): string {
    const { metadata, diffs, statistics } = report
    const out: string[] = [
      `# Diagnostic diff: ${this.escape(metadata.old.name)} → ${this.escape(metadata.new.name)}`,
      '',
      ...this.renderSnapshots(metadata),
      '',
      '## Statistics',
      '',
    ]

    if (statistics.rows.length === 0) {
      out.push('No changes detected.')
    } else {
      out.push(
        '| Lint | Removed | Added | Changed |',
        '| --- | ---: | ---: | ---: |',
        ...statistics.rows.map(
          (row) => `| ${this.escape(row.lint_name)} | ${row.removed} | ${row.added} | ${row.changed} |`
        ),
        `| **Total** | ${statistics.total.removed} | ${statistics.total.added} | ${statistics.total.changed} |`
      )
    }

    if (report.failed_projects.length > 0) {
      out.push(
        '',
        '## Failed projects',
        '',
        '| Project | Old status | New status | Old return code | New return code |',
        '| --- | --- | --- | ---: | ---: |',
        ...report.failed_projects.map(
          (failed) =>
            `| ${this.escape(failed.project)} | ${failed.old_status} | ${failed.new_status} | ` +
            `${failed.old_return_code ?? '-'} | ${failed.new_return_code ?? '-'} |`
        )
      )
    }

    this.pushProjects(out, 'Removed projects', diffs.removed_projects, 'removed')
    this.pushProjects(out, 'Added projects', diffs.added_projects, 'added')

    if (diffs.modified_projects.length > 0) {
      out.push('', '## Modified projects')
      for (const project of diffs.modified_projects) {
        out.push(...this.renderModifiedProject(project))
      }
    }

    return out.join('\n') + '\n'
  }

  renderEcosystem(report: EcosystemReport): string {
    const out: string[] = [
      `# Ecosystem report: ${this.escape(report.name)}`,
      '',
      `Checker commit: ${this.escape(report.commit)}. ${report.total} diagnostics.`,
      '',
      '## Projects',
      '',
      ...this.countTable('Project', report.projects),
      '',
      '## Lints',
      '',
      ...this.countTable('Lint', report.lints),
      '',
      '## Levels',
      '',
      ...this.countTable('Level', report.levels),
    ]

    if (report.skipped_projects.length > 0) {
      out.push('', '## Skipped projects', '', ...this.countTable('Project', report.skipped_projects))
    }

    out.push(
      '',
      '## Diagnostics',
      '',
      '| Project | Location | Level | Lint | Message |',
      '| --- | --- | --- | --- | --- |',
      ...report.diagnostics.map(
        (record) =>
          `| ${this.escape(record.project)} | ${this.escape(`${record.path}:${record.line}:${record.column}`)} | ` +
          `${record.level} | ${this.escape(record.lint_name)} | ${this.escape(record.message)} |`
      )
    )

    return out.join('\n') + '\n'
  }

  renderTiming(report: TimingReport): string {
    const { metadata, summary } = report
    const out: string[] = [
      `# Timing diff: ${this.escape(metadata.old.name)} → ${this.escape(metadata.new.name)}`,
      '',
      ...this.renderSnapshots(metadata),
      '',
      `- Speedups: ${summary.speedups}`,
      `- Slowdowns: ${summary.slowdowns}`,
      `- Timeouts: ${summary.timeouts}`,
      `- Abnormal exits: ${summary.abnormal_exits}`,
      `- Average factor: ${this.formatFactor(summary.avg_factor)}`,
    ]

    if (report.rows.length > 0) {
      out.push(
        '',
        '| Project | Old time (s) | New time (s) | Factor | Status |',
        '| --- | ---: | ---: | ---: | --- |',
        ...report.rows.map((row) => this.renderTimingRow(row))
      )
    }

    return out.join('\n') + '\n'
  }

  private renderSnapshots(metadata: DiffMetadata): string[] {
    const describe = (label: string, summary: SnapshotSummary) =>
      `- ${label}: ${this.escape(summary.name)} @ ${this.commitRef(summary.commit, metadata.checker_repo_url)} ` +
      `(${summary.diagnostics} diagnostics)`
    return [describe('Old', metadata.old), describe('New', metadata.new)]
  }

  private commitRef(commit: string, repoUrl?: string): string {
    if (!repoUrl || commit === 'unknown') {
      return this.escape(commit)
    }
    return this.link(this.escape(commit.slice(0, 7)), `${repoUrl}/commit/${commit}`)
  }

  private projectHeading(project: string, location?: string): string {
    return location ? `### ${this.link(this.escape(project), location)}` : `### ${this.escape(project)}`
  }

  private diagnostic(record: DiagnosticRecord): string {
    const location = this.escape(`${record.path}:${record.line}:${record.column}`)
    const text = `${record.level}[${this.escape(record.lint_name)}] ${location}: ${this.escape(record.message)}`
    return record.github_ref ? `${text} (${this.link('source', record.github_ref)})` : text
  }

  private pushProjects(
    out: string[],
    title: string,
    projects: readonly ProjectDiagnostics[],
    label: 'added' | 'removed'
  ): void {
    if (projects.length === 0) return

    out.push('', `## ${title}`)
    for (const project of projects) {
      out.push('', this.projectHeading(project.project, project.project_location), '')
      if (project.diagnostics.length === 0) {
        out.push('No diagnostics.')
        continue
      }
      out.push(...project.diagnostics.map((record) => `- ${label}: ${this.diagnostic(record)}`))
    }
  }

  private renderModifiedProject(project: ModifiedProject): string[] {
    const out: string[] = ['', this.projectHeading(project.project, project.project_location)]
    const { removed_files, added_files, modified_files } = project.diffs

    const files = (title: string, entries: readonly FileDiagnostics[], label: 'added' | 'removed') => {
      if (entries.length === 0) return
      out.push('', `#### ${title}`, '')
      for (const file of entries) {
        out.push(`- **${this.escape(file.path)}**`)
        out.push(...file.diagnostics.map((record) => `  - ${label}: ${this.diagnostic(record)}`))
      }
    }

    files('Removed files', removed_files, 'removed')
    files('Added files', added_files, 'added')

    if (modified_files.length > 0) {
      out.push('', '#### Modified files', '')
      for (const file of modified_files) {
        out.push(...this.renderModifiedFile(file))
      }
    }

    return out
  }

  private renderModifiedFile(file: ModifiedFile): string[] {
    const entries: LineEntry[] = []
    const { removed_lines, added_lines, modified_lines } = file.diffs
    const item = (label: string, record: DiagnosticRecord) => `    - ${label}: ${this.diagnostic(record)}`

    for (const line of removed_lines) {
      entries.push({ line: line.line, items: line.diagnostics.map((record) => item('removed', record)) })
    }
    for (const line of added_lines) {
      entries.push({ line: line.line, items: line.diagnostics.map((record) => item('added', record)) })
    }
    for (const line of modified_lines) {
      entries.push({
        line: line.line,
        items: [
          ...line.text_diffs.flatMap((diff) => [
            item('changed', diff.old),
            `      - now: ${this.diagnostic(diff.new)}`,
          ]),
          ...line.removed.map((record) => item('removed', record)),
          ...line.added.map((record) => item('added', record)),
        ],
      })
    }

    entries.sort((a, b) => a.line - b.line)

    return [
      `- **${this.escape(file.path)}**`,
      ...entries.flatMap((entry) => [`  - line ${entry.line}`, ...entry.items]),
    ]
  }

  private countTable(label: string, counts: readonly NamedCount[]): string[] {
    return [
      `| ${label} | Diagnostics |`,
      '| --- | ---: |',
      ...counts.map((entry) => `| ${this.escape(entry.name)} | ${entry.count} |`),
    ]
  }

  private renderTimingRow(row: TimingRow): string {
    const time = (value: number | null) => (value === null ? 'timeout' : value.toFixed(2))
    return (
      `| ${this.escape(row.project)} | ${time(row.old_time)} | ${time(row.new_time)} | ` +
      `${this.formatFactor(row.factor)} | ${row.failure_type ?? 'ok'} |`
    )
  }
}
