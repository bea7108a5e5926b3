export * from './types'
export { diffCommand } from './DiffCommand'
export { reportCommand } from './ReportCommand'
export { timingCommand } from './TimingCommand'
