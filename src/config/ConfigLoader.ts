import fs from 'fs'
import path from 'path'
import { DiffConfig } from '../contracts/types'
import { DiffConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export class ConfigLoader {
  private static DEFAULT_CONFIG: DiffConfig = {
    filters: {
      messages: [],
      projects: [],
    },
    report: {
      format: 'markdown',
      maxDiagnosticsPerProject: 1000,
    },
    runs: {
      successReturnCodes: [0, 1],
    },
    timing: {
      speedupFactor: 0.9,
      slowdownFactor: 1.1,
    },
  }

  private readonly config: DiffConfig

  constructor(private configPath?: string) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    const configNames = ['.diagdiff.config.json', 'diagdiff.config.json']

    // Start from current directory and walk up
    let currentDir = process.cwd()

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of configNames) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): DiffConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return DiffConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): DiffConfig {
    return this.config
  }

  isProjectIgnored(project: string): boolean {
    return this.config.filters.projects.some((pattern) => this.matchPattern(project, pattern))
  }

  private matchPattern(value: string, pattern: string): boolean {
    // Simple glob matching - supports * and **
    const regexPattern = pattern
      .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape regex special chars except * and ?
      .replace(/\*\*/g, '___DOUBLE_STAR___') // Temporary placeholder
      .replace(/\*/g, '[^/]*') // Single * matches anything except /
      .replace(/\?/g, '.') // ? matches any single character
      .replace(/___DOUBLE_STAR___/g, '.*') // ** matches anything including /

    const regex = new RegExp(`^${regexPattern}$`)
    return regex.test(value)
  }
}
