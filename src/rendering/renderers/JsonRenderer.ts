import { BaseRenderer } from './BaseRenderer'
import { DiffReport, EcosystemReport, TimingReport } from '../../contracts'

/**
 * Renders reports as indented JSON using the same snake_case layout as the
 * report objects
 */
export class JsonRenderer extends BaseRenderer {
  readonly format = 'json' as const
  readonly extension = '.json'

  renderDiff(report: DiffReport): string {
    return this.stringify({
      metadata: report.metadata,
      statistics: report.statistics,
      failed_projects: report.failed_projects,
      diffs: report.diffs,
    })
  }

  renderEcosystem(report: EcosystemReport): string {
    return this.stringify(report)
  }

  renderTiming(report: TimingReport): string {
    return this.stringify(report)
  }

  private stringify(value: unknown): string {
    // JSON has no Infinity; timing factors keep it as a string
    const replacer = (_key: string, item: unknown) =>
      typeof item === 'number' && !Number.isFinite(item) ? String(item) : item
    return JSON.stringify(value, replacer, 2) + '\n'
  }
}
