import {
  DiffTree,
  FileDiagnostics,
  FileDiffs,
  LineDiagnostics,
  LineDiffs,
  ModifiedFile,
  ModifiedLine,
  ModifiedProject,
  ProjectDiagnostics,
} from '../contracts'
import { Snapshot } from '../snapshot/Snapshot'
import { FileIndex, ProjectIndex } from '../snapshot/SnapshotIndex'
import { isEmptyLineMatch, matchLine } from './LineMatcher'
import { debugLog } from '../logging/debugLog'

export interface DiffOptions {
  /**
   * Projects present in both snapshots that should not be diffed, such as
   * projects whose checker run failed on either side
   */
  excludeProjects?: Iterable<string>
}

const wholeProject = (project: ProjectIndex): ProjectDiagnostics => ({
  project: project.project,
  ...(project.project_location !== undefined ? { project_location: project.project_location } : {}),
  diagnostics: project.diagnostics,
})

const wholeFile = (file: FileIndex): FileDiagnostics => ({
  path: file.path,
  diagnostics: file.diagnostics,
})

export function diffLines(oldFile: FileIndex, newFile: FileIndex): LineDiffs {
  const addedLines: LineDiagnostics[] = []
  const removedLines: LineDiagnostics[] = []
  const modifiedLines: ModifiedLine[] = []

  for (const [line, oldRecords] of oldFile.lines) {
    const newRecords = newFile.lines.get(line)
    if (!newRecords) {
      removedLines.push({ line, diagnostics: oldRecords })
      continue
    }

    const match = matchLine(oldRecords, newRecords)
    if (!isEmptyLineMatch(match)) {
      modifiedLines.push({ line, ...match })
    }
  }

  for (const [line, newRecords] of newFile.lines) {
    if (!oldFile.lines.has(line)) {
      addedLines.push({ line, diagnostics: newRecords })
    }
  }

  return {
    added_lines: addedLines,
    removed_lines: removedLines,
    modified_lines: modifiedLines,
  }
}

export function diffFiles(oldProject: ProjectIndex, newProject: ProjectIndex): FileDiffs {
  const addedFiles: FileDiagnostics[] = []
  const removedFiles: FileDiagnostics[] = []
  const modifiedFiles: ModifiedFile[] = []

  for (const [path, oldFile] of oldProject.files) {
    const newFile = newProject.files.get(path)
    if (!newFile) {
      removedFiles.push(wholeFile(oldFile))
      continue
    }

    const diffs = diffLines(oldFile, newFile)
    if (hasLineChanges(diffs)) {
      modifiedFiles.push({ path, diffs })
    }
  }

  for (const [path, newFile] of newProject.files) {
    if (!oldProject.files.has(path)) {
      addedFiles.push(wholeFile(newFile))
    }
  }

  return {
    added_files: addedFiles,
    removed_files: removedFiles,
    modified_files: modifiedFiles,
  }
}

export const hasLineChanges = (diffs: LineDiffs): boolean =>
  diffs.added_lines.length > 0 || diffs.removed_lines.length > 0 || diffs.modified_lines.length > 0

export const hasFileChanges = (diffs: FileDiffs): boolean =>
  diffs.added_files.length > 0 || diffs.removed_files.length > 0 || diffs.modified_files.length > 0

export const isEmptyDiffTree = (tree: DiffTree): boolean =>
  tree.added_projects.length === 0 &&
  tree.removed_projects.length === 0 &&
  tree.modified_projects.length === 0

/**
 * Walk project → file → line and collect what changed between two snapshots.
 *
 * Whole projects and files present on one side only are emitted as they are;
 * line matching only runs for lines present in both. Entries with no changes
 * are never emitted.
 */
export function buildDiffTree(
  oldSnapshot: Snapshot,
  newSnapshot: Snapshot,
  options: DiffOptions = {}
): DiffTree {
  const excluded = new Set(options.excludeProjects ?? [])
  const oldIndex = oldSnapshot.index
  const newIndex = newSnapshot.index

  const addedProjects: ProjectDiagnostics[] = []
  const removedProjects: ProjectDiagnostics[] = []
  const modifiedProjects: ModifiedProject[] = []

  for (const oldProject of oldIndex.projects()) {
    const newProject = newIndex.getProject(oldProject.project)
    if (!newProject) {
      removedProjects.push(wholeProject(oldProject))
      continue
    }

    if (excluded.has(oldProject.project)) {
      continue
    }

    const diffs = diffFiles(oldProject, newProject)
    if (hasFileChanges(diffs)) {
      const location = newProject.project_location ?? oldProject.project_location
      modifiedProjects.push({
        project: oldProject.project,
        ...(location !== undefined ? { project_location: location } : {}),
        diffs,
      })
    }
  }

  for (const newProject of newIndex.projects()) {
    if (!oldIndex.hasProject(newProject.project)) {
      addedProjects.push(wholeProject(newProject))
    }
  }

  debugLog({
    event: 'diff_tree_built',
    oldSnapshotId: oldSnapshot.id,
    newSnapshotId: newSnapshot.id,
    addedProjects: addedProjects.length,
    removedProjects: removedProjects.length,
    modifiedProjects: modifiedProjects.length,
    excludedProjects: Array.from(excluded),
  })

  return {
    added_projects: addedProjects,
    removed_projects: removedProjects,
    modified_projects: modifiedProjects,
  }
}
