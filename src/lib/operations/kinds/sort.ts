import { quoteIdentifier } from '@/lib/sql/sql'
import type { OperationDefinition, SortParams } from '../types'
import { issue, requireColumn } from '../validation'

export const sortOperation: OperationDefinition<SortParams> = {
  kind: 'sort',

  label: (params) => `Sort: ${params.keys.map((k) => `${k.column} ${k.direction}`).join(', ')}`,

  validate(params, ctx) {
    const issues = params.keys.flatMap((key, i) => requireColumn(ctx, key.column, `keys.${i}.column`))
    const seen = new Set<string>()
    for (const key of params.keys) {
      if (seen.has(key.column)) {
        issues.push(issue('DUPLICATE_KEY', `Column "${key.column}" appears twice in the sort keys`, 'keys'))
      }
      seen.add(key.column)
    }
    return issues
  },

  projectColumns: (_params, ctx) => ctx.columns,

  apply: (frame, params, ctx) => ctx.engine.sort(frame, params.keys),

  toSql(params, ctx) {
    const order = params.keys
      .map((k) => `${quoteIdentifier(k.column)} ${k.direction.toUpperCase()} NULLS LAST`)
      .join(', ')
    return `SELECT * FROM ${ctx.source} ORDER BY ${order}`
  },
}
