import type { ColumnInfo, JoinHow } from '@/types'

export interface JoinColumnPlan {
  /** Output columns: left columns first, then the kept right columns */
  columns: ColumnInfo[]
  /** Right-side columns carried into the output, with their output names */
  right: { source: string; target: string }[]
}

/**
 * Decide the output columns of a join.
 *
 * Inner and left joins drop the right key (it equals the left key); outer and
 * cross joins keep every right column. Right names colliding with a left name
 * get the suffix. Semi and anti joins keep the left columns only.
 */
export function planJoinColumns(
  left: ColumnInfo[],
  right: ColumnInfo[],
  how: JoinHow,
  rightKey: string | undefined,
  suffix: string
): JoinColumnPlan {
  const columns: ColumnInfo[] = left.map((c) => (how === 'outer' ? { ...c, nullable: true } : c))
  const mappings: JoinColumnPlan['right'] = []

  if (how === 'semi' || how === 'anti') {
    return { columns, right: mappings }
  }

  const dropsRightKey = how === 'inner' || how === 'left'
  const usedNames = new Set(left.map((c) => c.name))
  for (const column of right) {
    if (dropsRightKey && column.name === rightKey) continue
    const target = usedNames.has(column.name) ? `${column.name}${suffix}` : column.name
    usedNames.add(target)
    mappings.push({ source: column.name, target })
    columns.push({
      name: target,
      type: column.type,
      nullable: how === 'left' || how === 'outer' ? true : column.nullable,
    })
  }

  return { columns, right: mappings }
}
