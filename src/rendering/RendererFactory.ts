import { ReportFormat, ReportRenderer } from './Renderer'
import { MarkdownRenderer } from './renderers/MarkdownRenderer'
import { JsonRenderer } from './renderers/JsonRenderer'

export const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json']

export const isReportFormat = (value: string): value is ReportFormat =>
  REPORT_FORMATS.some((format) => format === value)

/**
 * Factory for creating renderer instances by format name
 */
export class RendererFactory {
  static createRenderer(format: ReportFormat): ReportRenderer {
    switch (format) {
      case 'markdown':
        return new MarkdownRenderer()
      case 'json':
        return new JsonRenderer()
    }
  }
}
