import { DiagnosticRecord, LineMatch, TextDiff } from '../contracts'

const groupByRule = (records: readonly DiagnosticRecord[]): Map<string, DiagnosticRecord[]> => {
  const groups = new Map<string, DiagnosticRecord[]>()
  for (const record of records) {
    const group = groups.get(record.lint_name)
    if (group) {
      group.push(record)
    } else {
      groups.set(record.lint_name, [record])
    }
  }
  return groups
}

/**
 * Match the diagnostics of one line in the old and new snapshot.
 *
 * Diagnostics are grouped by rule and paired by position within each rule.
 * Pairs with the same message are unchanged and dropped; pairs whose message
 * differs become text diffs; leftovers on either side are removed or added.
 * When a rule fires more than once on a line, position alone decides the
 * pairing.
 */
export function matchLine(
  oldRecords: readonly DiagnosticRecord[],
  newRecords: readonly DiagnosticRecord[]
): LineMatch {
  const oldByRule = groupByRule(oldRecords)
  const newByRule = groupByRule(newRecords)

  const rules = new Set<string>([...oldByRule.keys(), ...newByRule.keys()])

  const textDiffs: TextDiff[] = []
  const removed: DiagnosticRecord[] = []
  const added: DiagnosticRecord[] = []

  for (const rule of rules) {
    const olds = oldByRule.get(rule) ?? []
    const news = newByRule.get(rule) ?? []
    const paired = Math.min(olds.length, news.length)

    for (let i = 0; i < paired; i++) {
      if (olds[i].message !== news[i].message) {
        textDiffs.push({ old: olds[i], new: news[i] })
      }
    }

    removed.push(...olds.slice(paired))
    added.push(...news.slice(paired))
  }

  return { text_diffs: textDiffs, removed, added }
}

export const isEmptyLineMatch = (match: LineMatch): boolean =>
  match.text_diffs.length === 0 && match.removed.length === 0 && match.added.length === 0
