import type { CellValue } from '@/types'

const NUMERIC_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/

export function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (!NUMERIC_PATTERN.test(trimmed)) return null
    const parsed = Number(trimmed)
    // "1e999" matches the pattern but overflows
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

/**
 * Epoch milliseconds for a date-like value, null when it does not parse
 */
export function toDateMillis(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const ms = Date.parse(value)
    return Number.isNaN(ms) ? null : ms
  }
  return null
}

export function toBoolean(value: CellValue): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') {
    if (value === 1) return true
    if (value === 0) return false
    return null
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true
    if (normalized === 'false' || normalized === '0' || normalized === 'no') return false
  }
  return null
}

export function toText(value: CellValue): string {
  return value === null ? '' : String(value)
}
