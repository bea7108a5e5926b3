import { DiagnosticRecord } from '../contracts'

export interface FileIndex {
  readonly path: string
  readonly diagnostics: readonly DiagnosticRecord[]
  readonly lines: ReadonlyMap<number, readonly DiagnosticRecord[]>
}

export interface ProjectIndex {
  readonly project: string
  readonly project_location?: string
  readonly diagnostics: readonly DiagnosticRecord[]
  readonly files: ReadonlyMap<string, FileIndex>
}

export interface DeclaredProject {
  project: string
  project_location?: string
}

interface MutableFileIndex {
  path: string
  diagnostics: DiagnosticRecord[]
  lines: Map<number, DiagnosticRecord[]>
}

interface MutableProjectIndex {
  project: string
  project_location?: string
  diagnostics: DiagnosticRecord[]
  files: Map<string, MutableFileIndex>
}

/**
 * Three-level lookup (project → path → line) over a flat list of diagnostics.
 *
 * Every level is an insertion-ordered Map, so iteration follows the order in
 * which projects, files and lines were first seen in the input.
 */
export class SnapshotIndex {
  private constructor(private readonly projectMap: ReadonlyMap<string, ProjectIndex>) {}

  static build(
    records: readonly DiagnosticRecord[],
    declaredProjects: readonly DeclaredProject[] = []
  ): SnapshotIndex {
    const projects = new Map<string, MutableProjectIndex>()

    const projectFor = (project: string, location?: string): MutableProjectIndex => {
      let entry = projects.get(project)
      if (!entry) {
        entry = { project, project_location: location, diagnostics: [], files: new Map() }
        projects.set(project, entry)
      } else if (entry.project_location === undefined && location !== undefined) {
        entry.project_location = location
      }
      return entry
    }

    // Declared projects keep their place even when they have no diagnostics
    for (const declared of declaredProjects) {
      projectFor(declared.project, declared.project_location)
    }

    for (const record of records) {
      const project = projectFor(record.project, record.project_location)
      project.diagnostics.push(record)

      let file = project.files.get(record.path)
      if (!file) {
        file = { path: record.path, diagnostics: [], lines: new Map() }
        project.files.set(record.path, file)
      }
      file.diagnostics.push(record)

      const line = file.lines.get(record.line)
      if (line) {
        line.push(record)
      } else {
        file.lines.set(record.line, [record])
      }
    }

    return new SnapshotIndex(projects)
  }

  get size(): number {
    return this.projectMap.size
  }

  hasProject(project: string): boolean {
    return this.projectMap.has(project)
  }

  getProject(project: string): ProjectIndex | undefined {
    return this.projectMap.get(project)
  }

  projects(): IterableIterator<ProjectIndex> {
    return this.projectMap.values()
  }

  projectNames(): string[] {
    return Array.from(this.projectMap.keys())
  }
}
