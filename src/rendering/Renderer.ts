import { DiffReport, EcosystemReport, TimingReport } from '../contracts'

export type ReportFormat = 'markdown' | 'json'

/**
 * Turns computed reports into text. Renderers take every count from the
 * report they are given and never recompute them from the diff tree.
 */
export interface ReportRenderer {
  readonly format: ReportFormat

  /**
   * File extension (with the leading dot) for reports written to disk
   */
  readonly extension: string

  renderDiff(report: DiffReport): string

  renderEcosystem(report: EcosystemReport): string

  renderTiming(report: TimingReport): string
}
