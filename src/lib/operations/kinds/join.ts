/**
 * Join operation
 *
 * Combines the current frame with another loaded dataset. The right frame is
 * resolved through the workspace when the operation runs, not when it is
 * recorded.
 */

import { areCategoriesCompatible, fail, findColumn, getTypeCategory, planJoinColumns } from '@/lib/frame'
import { quoteIdentifier } from '@/lib/sql/sql'
import type { JoinParams, OperationDefinition } from '../types'
import { columnCategory, issue, requireColumn } from '../validation'

const SQL_JOINS: Record<JoinParams['how'], string> = {
  inner: 'INNER JOIN',
  left: 'LEFT JOIN',
  outer: 'FULL OUTER JOIN',
  cross: 'CROSS JOIN',
  semi: 'SEMI JOIN',
  anti: 'ANTI JOIN',
}

export const joinOperation: OperationDefinition<JoinParams> = {
  kind: 'join',

  label(params) {
    if (params.how === 'cross') {
      return 'Join: cross join (Cartesian product)'
    }
    const keys =
      params.leftKey === params.rightKey ? `${params.leftKey}` : `${params.leftKey} = ${params.rightKey}`
    return `Join: ${params.how} join on ${keys}`
  },

  validate(params, ctx) {
    const right = ctx.resolveDataset(params.rightDatasetId)
    if (!right) {
      return [issue('NO_DATASET', `Dataset "${params.rightDatasetId}" is not loaded`, 'rightDatasetId')]
    }
    if (params.how === 'cross') {
      return []
    }
    if (!params.leftKey || !params.rightKey) {
      return [issue('KEY_REQUIRED', `A ${params.how} join requires a left and a right key`, 'leftKey')]
    }

    const issues = requireColumn(ctx, params.leftKey, 'leftKey')
    const rightColumn = findColumn(right.columns, params.rightKey)
    if (!rightColumn) {
      issues.push(issue('NO_COLUMN', `Column "${params.rightKey}" does not exist in "${right.name}"`, 'rightKey'))
    }

    const leftCategory = columnCategory(ctx, params.leftKey)
    if (rightColumn && leftCategory !== null) {
      const rightCategory = getTypeCategory(rightColumn.type)
      if (!areCategoriesCompatible(leftCategory, rightCategory)) {
        issues.push(
          issue(
            'INCOMPATIBLE_KEYS',
            `Join keys have incompatible types: "${params.leftKey}" is ${leftCategory}, "${params.rightKey}" is ${rightCategory}`,
            'rightKey'
          )
        )
      }
    }

    return issues
  },

  projectColumns(params, ctx) {
    const right = ctx.resolveDataset(params.rightDatasetId)
    if (ctx.columns === null || !right) return null
    return planJoinColumns(ctx.columns, right.columns, params.how, params.rightKey, params.rightSuffix).columns
  },

  async apply(frame, params, ctx) {
    const handle = ctx.resolveDataset(params.rightDatasetId)
    if (!handle) {
      return fail('ENGINE_INTERNAL', `Dataset "${params.rightDatasetId}" is not loaded`)
    }
    const right = await handle.collect()
    return ctx.engine.join(frame, right, {
      how: params.how,
      leftOn: params.leftKey,
      rightOn: params.rightKey,
      suffix: params.rightSuffix,
    })
  },

  toSql(params, ctx) {
    const rightTable = ctx.resolveTableName(params.rightDatasetId)
    const joinClause = `${ctx.source} AS l ${SQL_JOINS[params.how]} ${rightTable} AS r`
    const on =
      params.how === 'cross' ? '' : ` ON l.${quoteIdentifier(params.leftKey ?? '')} = r.${quoteIdentifier(params.rightKey ?? '')}`

    if (params.how === 'semi' || params.how === 'anti') {
      return `SELECT l.* FROM ${joinClause}${on}`
    }

    const right = ctx.resolveDataset(params.rightDatasetId)
    if (ctx.columns !== null && right) {
      const plan = planJoinColumns(ctx.columns, right.columns, params.how, params.rightKey, params.rightSuffix)
      const select = [
        ...ctx.columns.map((c) => `l.${quoteIdentifier(c.name)}`),
        ...plan.right.map((m) =>
          m.source === m.target
            ? `r.${quoteIdentifier(m.source)}`
            : `r.${quoteIdentifier(m.source)} AS ${quoteIdentifier(m.target)}`
        ),
      ]
      return `SELECT ${select.join(', ')} FROM ${joinClause}${on}`
    }

    const rightSelect =
      (params.how === 'inner' || params.how === 'left') && params.rightKey
        ? `r.* EXCLUDE (${quoteIdentifier(params.rightKey)})`
        : 'r.*'
    return `SELECT l.*, ${rightSelect} FROM ${joinClause}${on}`
  },
}
