import { ReportFormat, ReportRenderer } from '../Renderer'
import { DiffReport, EcosystemReport, TimingReport } from '../../contracts'

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

/**
 * Base implementation of the ReportRenderer interface
 */
export abstract class BaseRenderer implements ReportRenderer {
  abstract readonly format: ReportFormat
  abstract readonly extension: string

  /**
   * Escape untrusted text (messages, paths, project and rule names) for
   * embedding in Markdown or HTML
   */
  protected escape(text: string): string {
    return text
      .replace(/\\/g, '\\\\')
      .replace(/[&<>"']/g, (char) => HTML_ENTITIES[char] ?? char)
      .replace(/[|`*_[\]]/g, (char) => `\\${char}`)
      .replace(/\r?\n/g, ' ')
  }

  /**
   * Markdown link to an http(s) URL. Other schemes are written out as
   * escaped text next to the label.
   */
  protected link(label: string, url: string): string {
    if (!/^https?:\/\//i.test(url)) {
      return `${label}: ${this.escape(url)}`
    }
    return `[${label}](${this.safeUrl(url)})`
  }

  /**
   * Percent-encode the characters that would end a Markdown link target
   */
  protected safeUrl(url: string): string {
    return url.replace(/[\s()<>]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`)
  }

  protected formatFactor(factor: number): string {
    return Number.isFinite(factor) ? `${factor.toFixed(2)}x` : '∞'
  }

  abstract renderDiff(report: DiffReport): string

  abstract renderEcosystem(report: EcosystemReport): string

  abstract renderTiming(report: TimingReport): string
}
