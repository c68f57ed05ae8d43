function compare(value: unknown, target: unknown): number | null {
  if (typeof value === 'number' && typeof target === 'number') {
    if (Number.isNaN(value) || Number.isNaN(target)) return null;
    return value === target ? 0 : value < target ? -1 : 1;
  }
  if (typeof value === 'string' && typeof target === 'string') {
    return value === target ? 0 : value < target ? -1 : 1;
  }
  return null;
}

/**
 * Evaluate `value <operator> target`.
 *
 * Numbers compare numerically and strings lexicographically. Any pair that
 * cannot be compared (mixed types, NaN, objects, an unknown operator)
 * yields `false`.
 */
export function evaluateCondition(value: unknown, operator: string, target: unknown): boolean {
  if (operator === '==') {
    return typeof value === typeof target && value === target;
  }

  const order = compare(value, target);
  if (order === null) return false;

  switch (operator) {
    case '>=':
      return order >= 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '<':
      return order < 0;
    default:
      return false;
  }
}
