import { describe, it, expect } from 'vitest'
import {
  collectFrame,
  createDuckDBEngine,
  createLazyFrame,
  getColumnValues,
  getPage,
  getSchema,
  toNumber,
} from '@/lib/frame'
import { cities, column, frameOf, names, passengers, unwrap, values } from '@/test/fixtures'

const engine = createDuckDBEngine()

describe('duckdb engine', () => {
  describe('filter', () => {
    it('keeps rows matching a numeric comparison in original order', async () => {
      const result = unwrap(await engine.filter(passengers(), { type: 'compare', column: 'Age', operator: 'gt', value: 30 }))

      expect(values(result, 'Age')).toEqual([40, 31])
      expect(result.columns).toEqual(passengers().columns)
    })

    it('reports TYPE_MISMATCH when the value cannot be read as a number', async () => {
      const result = await engine.filter(passengers(), { type: 'compare', column: 'Fare', operator: 'lt', value: 'abc' })

      expect(result).toEqual({
        ok: false,
        error: { kind: 'TYPE_MISMATCH', message: 'Cannot compare numeric column "Fare" with "abc"' },
      })
    })

    it('reports COLUMN_NOT_FOUND for unknown columns', async () => {
      const result = await engine.filter(passengers(), { type: 'compare', column: 'Deck', operator: 'eq', value: 'A' })

      expect(result).toEqual({ ok: false, error: { kind: 'COLUMN_NOT_FOUND', message: 'Column "Deck" not found' } })
    })

    it('rejects ordering operators on text columns', async () => {
      const result = await engine.filter(passengers(), { type: 'compare', column: 'City', operator: 'gt', value: 'M' })

      expect(result).toEqual({
        ok: false,
        error: { kind: 'INVALID_OPERATOR', message: 'Operator "gt" is not valid for text column "City"' },
      })
    })

    it('matches text case-insensitively for contains', async () => {
      const result = unwrap(
        await engine.filter(passengers(), { type: 'compare', column: 'City', operator: 'contains', value: 'OS' })
      )

      expect(values(result, 'Name')).toEqual(['Ann', 'Cy'])
    })

    it('excludes null cells from comparisons but not from is_null', async () => {
      const frame = frameOf(
        [column('Age', 'BIGINT')],
        [{ Age: 25 }, { Age: null }, { Age: 40 }]
      )

      const neq = unwrap(await engine.filter(frame, { type: 'compare', column: 'Age', operator: 'neq', value: 25 }))
      const isNull = unwrap(await engine.filter(frame, { type: 'compare', column: 'Age', operator: 'is_null' }))

      expect(values(neq, 'Age')).toEqual([40])
      expect(isNull.rows).toHaveLength(1)
    })

    it('combines conditions with and/or', async () => {
      const result = unwrap(
        await engine.filter(passengers(), {
          type: 'or',
          conditions: [
            { type: 'compare', column: 'Age', operator: 'lt', value: 30 },
            { type: 'compare', column: 'City', operator: 'eq', value: 'Rome' },
          ],
        })
      )

      expect(values(result, 'Name')).toEqual(['Ann', 'Bob'])
    })

    it('compares date columns by instant and returns the input cells', async () => {
      const frame = frameOf(
        [column('joined', 'DATE'), column('id', 'BIGINT')],
        [
          { joined: '2024-01-05', id: 1 },
          { joined: '2023-12-31', id: 2 },
          { joined: null, id: 3 },
        ]
      )

      const result = unwrap(
        await engine.filter(frame, { type: 'compare', column: 'joined', operator: 'gt', value: '2024-01-01' })
      )

      expect(result.rows).toEqual([{ joined: '2024-01-05', id: 1 }])
    })

    it('matches text equality exactly', async () => {
      const result = unwrap(await engine.filter(passengers(), { type: 'compare', column: 'City', operator: 'eq', value: 'oslo' }))

      expect(result.rows).toEqual([])
    })
  })

  describe('groupBy', () => {
    it('aggregates per group in first-appearance order', async () => {
      const result = unwrap(
        await engine.groupBy(
          passengers(),
          ['City'],
          [
            { column: 'Fare', fn: 'sum', alias: 'Fare_sum' },
            { column: 'Age', fn: 'count', alias: 'Age_count' },
          ]
        )
      )

      expect(names(result)).toEqual(['City', 'Fare_sum', 'Age_count'])
      expect(result.columns.map((c) => c.type)).toEqual(['VARCHAR', 'DOUBLE', 'BIGINT'])
      expect(values(result, 'City')).toEqual(['Oslo', 'Rome'])
      expect(values(result, 'Age_count')).toEqual([2, 1])
      expect(result.rows[0].Fare_sum).toBeCloseTo(15.3)
      expect(result.rows[1].Fare_sum).toBe(71.5)
    })

    it('rejects numeric reducers on text columns', async () => {
      const result = await engine.groupBy(passengers(), [], [{ column: 'Name', fn: 'mean', alias: 'Name_mean' }])

      expect(result).toEqual({
        ok: false,
        error: { kind: 'TYPE_MISMATCH', message: 'Cannot compute mean of text column "Name"' },
      })
    })

    it('yields one row for a global aggregation over an empty frame', async () => {
      const empty = frameOf(passengers().columns, [])
      const result = unwrap(
        await engine.groupBy(
          empty,
          [],
          [
            { column: 'Age', fn: 'count', alias: 'n' },
            { column: 'Age', fn: 'mean', alias: 'avg' },
          ]
        )
      )

      expect(result.rows).toEqual([{ n: 0, avg: null }])
    })

    it('computes order statistics per group', async () => {
      const frame = frameOf(
        [column('g', 'VARCHAR'), column('v', 'BIGINT')],
        [
          { g: 'a', v: 1 },
          { g: 'a', v: 4 },
          { g: 'b', v: 2 },
          { g: 'a', v: 7 },
        ]
      )

      const result = unwrap(
        await engine.groupBy(
          frame,
          ['g'],
          [
            { column: 'v', fn: 'min', alias: 'lo' },
            { column: 'v', fn: 'max', alias: 'hi' },
            { column: 'v', fn: 'median', alias: 'mid' },
            { column: 'v', fn: 'std', alias: 'sd' },
          ]
        )
      )

      expect(result.columns.map((c) => c.type)).toEqual(['VARCHAR', 'BIGINT', 'BIGINT', 'DOUBLE', 'DOUBLE'])
      expect(values(result, 'g')).toEqual(['a', 'b'])
      expect(values(result, 'lo')).toEqual([1, 2])
      expect(values(result, 'hi')).toEqual([7, 2])
      expect(values(result, 'mid')).toEqual([4, 2])
      expect(result.rows[0].sd).toBeCloseTo(3)
      expect(result.rows[1].sd).toBeNull()
    })
  })

  describe('pivot', () => {
    const sales = frameOf(
      [column('region', 'VARCHAR'), column('quarter', 'VARCHAR'), column('amount', 'BIGINT')],
      [
        { region: 'N', quarter: 'Q1', amount: 10 },
        { region: 'N', quarter: 'Q2', amount: 5 },
        { region: 'S', quarter: 'Q1', amount: 7 },
        { region: 'N', quarter: 'Q1', amount: 3 },
      ]
    )

    it('spreads pivot values into columns, null where a combination is missing', async () => {
      const result = unwrap(
        await engine.pivot(sales, { index: ['region'], on: ['quarter'], values: [{ column: 'amount', fn: 'sum' }] })
      )

      expect(names(result)).toEqual(['region', 'amount_sum_Q1', 'amount_sum_Q2'])
      expect(result.rows).toEqual([
        { region: 'N', amount_sum_Q1: 13, amount_sum_Q2: 5 },
        { region: 'S', amount_sum_Q1: 7, amount_sum_Q2: null },
      ])
    })

    it('picks the first row per cell and counts rows with len', async () => {
      const result = unwrap(
        await engine.pivot(sales, {
          index: ['region'],
          on: ['quarter'],
          values: [
            { column: 'amount', fn: 'first' },
            { column: 'amount', fn: 'len' },
          ],
        })
      )

      expect(names(result)).toEqual(['region', 'amount_first_Q1', 'amount_first_Q2', 'amount_len_Q1', 'amount_len_Q2'])
      expect(result.rows).toEqual([
        { region: 'N', amount_first_Q1: 10, amount_first_Q2: 5, amount_len_Q1: 2, amount_len_Q2: 1 },
        { region: 'S', amount_first_Q1: 7, amount_first_Q2: null, amount_len_Q1: 1, amount_len_Q2: null },
      ])
    })

    it('requires numeric value columns', async () => {
      const result = await engine.pivot(sales, {
        index: ['region'],
        on: ['quarter'],
        values: [{ column: 'region', fn: 'first' }],
      })

      expect(result.ok).toBe(false)
      expect(result.ok ? null : result.error.kind).toBe('TYPE_MISMATCH')
    })
  })

  describe('join', () => {
    it('inner join drops the right key and keeps left order', async () => {
      const result = unwrap(
        await engine.join(passengers(), cities(), { how: 'inner', leftOn: 'City', rightOn: 'City', suffix: '_right' })
      )

      expect(names(result)).toEqual(['Name', 'Age', 'Fare', 'City', 'Country'])
      expect(values(result, 'Country')).toEqual(['Norway', 'Italy', 'Norway'])
    })

    it('outer join appends unmatched right rows with null left cells', async () => {
      const result = unwrap(
        await engine.join(passengers(), cities(), { how: 'outer', leftOn: 'City', rightOn: 'City', suffix: '_right' })
      )

      expect(names(result)).toEqual(['Name', 'Age', 'Fare', 'City', 'City_right', 'Country'])
      expect(result.rows).toHaveLength(4)
      expect(result.rows[3]).toEqual({ Name: null, Age: null, Fare: null, City: null, City_right: 'Lima', Country: 'Peru' })
    })

    it('anti join keeps left rows without a match', async () => {
      const lookup = frameOf(cities().columns, [{ City: 'Rome', Country: 'Italy' }])
      const result = unwrap(
        await engine.join(passengers(), lookup, { how: 'anti', leftOn: 'City', rightOn: 'City', suffix: '_right' })
      )

      expect(names(result)).toEqual(['Name', 'Age', 'Fare', 'City'])
      expect(values(result, 'Name')).toEqual(['Ann', 'Cy'])
    })

    it('left join fills unmatched right cells with null', async () => {
      const lookup = frameOf(cities().columns, [{ City: 'Rome', Country: 'Italy' }])
      const result = unwrap(
        await engine.join(passengers(), lookup, { how: 'left', leftOn: 'City', rightOn: 'City', suffix: '_right' })
      )

      expect(names(result)).toEqual(['Name', 'Age', 'Fare', 'City', 'Country'])
      expect(values(result, 'Country')).toEqual([null, 'Italy', null])
    })

    it('semi join keeps matching left rows once', async () => {
      const lookup = frameOf(cities().columns, [
        { City: 'Oslo', Country: 'Norway' },
        { City: 'Oslo', Country: 'Norge' },
      ])
      const result = unwrap(
        await engine.join(passengers(), lookup, { how: 'semi', leftOn: 'City', rightOn: 'City', suffix: '_right' })
      )

      expect(values(result, 'Name')).toEqual(['Ann', 'Cy'])
    })

    it('cross join pairs every row in left-then-right order', async () => {
      const left = frameOf([column('x', 'BIGINT')], [{ x: 1 }, { x: 2 }])
      const right = frameOf([column('x', 'BIGINT')], [{ x: 10 }, { x: 20 }])

      const result = unwrap(await engine.join(left, right, { how: 'cross', suffix: '_r' }))

      expect(result.rows).toEqual([
        { x: 1, x_r: 10 },
        { x: 1, x_r: 20 },
        { x: 2, x_r: 10 },
        { x: 2, x_r: 20 },
      ])
    })

    it('reports incompatible key types', async () => {
      const result = await engine.join(passengers(), cities(), {
        how: 'inner',
        leftOn: 'Age',
        rightOn: 'City',
        suffix: '_right',
      })

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'TYPE_MISMATCH',
          message: 'Join keys have incompatible types: "Age" is numeric, "City" is text',
        },
      })
    })
  })

  describe('sort', () => {
    it('sorts descending with nulls last and ties in original order', async () => {
      const frame = frameOf(
        [column('k', 'BIGINT'), column('id', 'VARCHAR')],
        [
          { k: 1, id: 'a' },
          { k: null, id: 'b' },
          { k: 3, id: 'c' },
          { k: 1, id: 'd' },
        ]
      )

      const result = unwrap(await engine.sort(frame, [{ column: 'k', direction: 'desc' }]))

      expect(values(result, 'id')).toEqual(['c', 'a', 'd', 'b'])
    })
  })

  describe('column edits', () => {
    it('refuses a rename onto an existing column', async () => {
      const result = await engine.rename(passengers(), { Name: 'City' })

      expect(result).toEqual({ ok: false, error: { kind: 'INVALID_OPERATOR', message: 'Column "City" already exists' } })
    })

    it('casts numbers to text and updates the declared type', async () => {
      const result = unwrap(await engine.cast(passengers(), 'Age', 'text'))

      expect(values(result, 'Age')).toEqual(['25', '40', '31'])
      expect(result.columns[1]).toEqual({ name: 'Age', type: 'VARCHAR', nullable: true })
    })

    it('fails the whole cast on the first value that does not convert', async () => {
      const result = await engine.cast(passengers(), 'Name', 'numeric')

      expect(result).toEqual({
        ok: false,
        error: { kind: 'TYPE_MISMATCH', message: 'Cannot cast "Ann" in column "Name" to numeric' },
      })
    })

    it('casts text to dates and declares a timestamp column', async () => {
      const frame = frameOf([column('when', 'VARCHAR')], [{ when: '2024-01-05' }, { when: null }])

      const result = unwrap(await engine.cast(frame, 'when', 'date'))

      expect(result.columns).toEqual([{ name: 'when', type: 'TIMESTAMP', nullable: true }])
      expect(String(result.rows[0].when).startsWith('2024-01-05')).toBe(true)
      expect(result.rows[1].when).toBeNull()
    })

    it('leaves the input frame untouched', async () => {
      const input = passengers()

      unwrap(await engine.cast(input, 'Age', 'text'))
      unwrap(await engine.fillNull(input, 'City', 'Lima'))

      expect(input.rows[0]).toEqual({ Name: 'Ann', Age: 25, Fare: 7.25, City: 'Oslo' })
    })

    it('fills nulls with a value coerced to the column type', async () => {
      const frame = frameOf([column('Age', 'BIGINT')], [{ Age: null }, { Age: 5 }])

      const result = unwrap(await engine.fillNull(frame, 'Age', '0'))

      expect(values(result, 'Age')).toEqual([0, 5])
      expect(result.columns[0].nullable).toBe(false)
    })

    it('drops and selects columns', async () => {
      const dropped = unwrap(await engine.drop(passengers(), ['Fare', 'City']))
      const selected = unwrap(await engine.select(passengers(), ['City', 'Name']))

      expect(names(dropped)).toEqual(['Name', 'Age'])
      expect(names(selected)).toEqual(['City', 'Name'])
      expect(selected.rows[0]).toEqual({ City: 'Oslo', Name: 'Ann' })
    })
  })
})

describe('value coercion', () => {
  it('reads numeric strings and rejects ones that overflow', () => {
    expect(toNumber(' 42 ')).toBe(42)
    expect(toNumber('2.5e3')).toBe(2500)
    expect(toNumber('1e999')).toBeNull()
    expect(toNumber('-1e999')).toBeNull()
    expect(toNumber('12abc')).toBeNull()
  })
})

describe('frame helpers', () => {
  it('pages rows for display', () => {
    const page = getPage(passengers(), 1, 2)

    expect(page.rows.map((r) => r.Name)).toEqual(['Cy'])
    expect(page.totalRows).toBe(3)
    expect(page.totalPages).toBe(2)
  })

  it('uses the preview page size by default', () => {
    expect(getPage(passengers(), 0).pageSize).toBe(500)
  })

  it('derives the schema from column types', () => {
    expect(getSchema(passengers().columns)).toEqual({ Name: 'text', Age: 'numeric', Fare: 'numeric', City: 'text' })
  })

  it('reads a column and collects lazy sources', async () => {
    const lazy = createLazyFrame(passengers().columns, async () => passengers())

    expect(getColumnValues(await collectFrame(lazy), 'City')).toEqual(['Oslo', 'Rome', 'Oslo'])
  })
})
