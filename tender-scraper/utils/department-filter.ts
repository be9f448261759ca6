/**
 * Department selection for the organisation listing
 */

import type { DepartmentRow } from '../types'

export function parseDepartments(raw: string | undefined | null): string[] {
  return (raw || '')
    .split(',')
    .map(dept => dept.trim())
    .filter(dept => dept.length > 0)
}

/**
 * Organisation names on the listing must match exactly; the portal lists
 * near-identical names for different bodies. A same-named row carrying a
 * link wins over one without.
 */
export function findDepartment(rows: DepartmentRow[], name: string): DepartmentRow | null {
  const matches = rows.filter(row => row.name === name)
  return matches.find(row => row.href !== null) ?? matches[0] ?? null
}
