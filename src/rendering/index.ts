export type { ReportRenderer, ReportFormat } from './Renderer'
export { RendererFactory, REPORT_FORMATS, isReportFormat } from './RendererFactory'
export { MarkdownRenderer } from './renderers/MarkdownRenderer'
export { JsonRenderer } from './renderers/JsonRenderer'
export { BaseRenderer } from './renderers/BaseRenderer'
