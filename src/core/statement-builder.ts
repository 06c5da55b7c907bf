/**
 * Statement Builder
 *
 * Shared glue for method bodies: the exec call used by Create, Update and
 * Delete, and the query-row call used by Select. The generated code targets a
 * pgx-style handle, `p.db.Exec(ctx, sql, args...)` returning a command tag and
 * `p.db.QueryRow(ctx, sql, args...).Scan(dest...)`.
 */

/**
 * Render text as a Go interpreted string literal
 */
export function goString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`
}

function callArgs(sql: string, values: readonly string[]): string {
  return ['ctx', goString(sql), ...values].join(', ')
}

/**
 * Exec call that fails on a driver error and, separately, when no row was
 * affected
 */
export function buildExecBody(methodName: string, sql: string, values: readonly string[]): string {
  const lines = [
    `\tctg, err := p.db.Exec(${callArgs(sql, values)})`,
    '\tif err != nil {',
    `\t\treturn fmt.Errorf("${methodName} error: %w ", err)`,
    '\t}',
    '\tif ctg.RowsAffected() == 0 {',
    `\t\treturn fmt.Errorf("${methodName} error: no rows affected")`,
    '\t}',
    '',
    '\treturn nil',
  ]
  return lines.join('\n')
}

/**
 * Single-row query scanned into the named `element` result
 */
export function buildQueryRowBody(
  methodName: string,
  sql: string,
  values: readonly string[],
  scanTargets: readonly string[]
): string {
  const lines = [
    `\terr = p.db.QueryRow(${callArgs(sql, values)}).Scan(${scanTargets.join(', ')})`,
    '\tif err != nil {',
    `\t\treturn nil, fmt.Errorf("${methodName} error: %w ", err)`,
    '\t}',
    '',
    '\treturn element, nil',
  ]
  return lines.join('\n')
}
