#!/usr/bin/env node

import { Command } from 'commander'
import pc from 'picocolors'
import { diffCommand, reportCommand, timingCommand, CommandResult, OutputOptions, PairOptions } from '../commands'
import { REPORT_FORMATS } from '../rendering'

const print = (result: CommandResult): void => {
  if (result.outputPath) {
    console.log(pc.green(`Report written to ${result.outputPath}`))
    return
  }
  process.stdout.write(result.text)
}

const fail = (error: unknown): never => {
  console.error(pc.red('Error:'), error instanceof Error ? error.message : error)
  process.exit(1)
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('diagdiff')
    .description('Compare diagnostic snapshots taken by a code checker across many projects')
    .version('0.1.0')

  program
    .command('diff')
    .description('Diff two snapshots and report added, removed and changed diagnostics')
    .argument('<old>', 'Snapshot taken with the baseline checker')
    .argument('<new>', 'Snapshot taken with the candidate checker')
    .option('--old-name <name>', 'Display name for the old snapshot')
    .option('--new-name <name>', 'Display name for the new snapshot')
    .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join(', ')})`)
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-c, --config <file>', 'Path to a config file')
    .action(async (oldPath: string, newPath: string, options: PairOptions) => {
      try {
        print(await diffCommand(oldPath, newPath, options))
      } catch (error) {
        fail(error)
      }
    })

  program
    .command('report')
    .description('Summarize the diagnostics of a single snapshot')
    .argument('<snapshot>', 'Snapshot file')
    .option('--name <name>', 'Display name for the snapshot')
    .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join(', ')})`)
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-c, --config <file>', 'Path to a config file')
    .action(async (snapshotPath: string, options: OutputOptions & { name?: string }) => {
      try {
        print(await reportCommand(snapshotPath, options))
      } catch (error) {
        fail(error)
      }
    })

  program
    .command('timing')
    .description('Compare checker run times between two snapshots')
    .argument('<old>', 'Snapshot taken with the baseline checker')
    .argument('<new>', 'Snapshot taken with the candidate checker')
    .option('--old-name <name>', 'Display name for the old snapshot')
    .option('--new-name <name>', 'Display name for the new snapshot')
    .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join(', ')})`)
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-c, --config <file>', 'Path to a config file')
    .action(async (oldPath: string, newPath: string, options: PairOptions) => {
      try {
        print(await timingCommand(oldPath, newPath, options))
      } catch (error) {
        fail(error)
      }
    })

  return program
}

// Only run if this is the main module
if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(fail)
}
