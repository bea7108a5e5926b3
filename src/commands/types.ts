export interface OutputOptions {
  format?: string
  output?: string
  config?: string
}

export interface PairOptions extends OutputOptions {
  oldName?: string
  newName?: string
}

export interface CommandResult {
  // Rendered report
  text: string
  // Set when the report was written to a file instead of being returned for stdout
  outputPath?: string
}
