/**
 * Branded Decimal type for stock quantities.
 * REAL columns come back as floats; report arithmetic goes through decimal.js
 * so differences like 0.3 - 0.1 print as 0.20.
 */

import { Decimal as DecimalConstructor } from 'decimal.js';

/** Base Decimal instance type */
export type Decimal = InstanceType<typeof DecimalConstructor>;

/** Stock quantity (fractional units allowed) */
export type Quantity = Decimal & { readonly __brand: 'Quantity' };

function brandQuantity(d: Decimal): Quantity {
  return d as Quantity;
}

/** Quantity from string/number */
export function toQuantity(value: string | number | Decimal): Quantity {
  return brandQuantity(new DecimalConstructor(value));
}

/** Quantity - Quantity = Quantity */
export function subQuantity(a: Quantity, b: Quantity): Quantity {
  return brandQuantity((a as Decimal).minus(b as Decimal));
}

/** -0.001 rounds to -0.00; print it as 0.00 */
function fixed2(q: Quantity): string {
  const text = q.toFixed(2);
  return text === '-0.00' ? '0.00' : text;
}

/** Two-decimal rendering used by every report column */
export function formatQuantity(value: number | Quantity): string {
  return fixed2(typeof value === 'number' ? toQuantity(value) : value);
}

/** Signed two-decimal rendering for deltas: +1.50, -0.25, 0.00 */
export function formatDelta(value: number | Quantity): string {
  const q = typeof value === 'number' ? toQuantity(value) : value;
  const text = fixed2(q);
  return q.greaterThan(0) ? `+${text}` : text;
}
