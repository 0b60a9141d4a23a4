/**
 * PostgreSQL REAL → Quantity conversion.
 * pg parses REAL (float4) to number; NUMERIC/text come back as strings.
 */

import { toQuantity, type Quantity } from '../types/decimal.js';

type PgNumeric = string | number | null;

export function pgToQuantity(value: PgNumeric): Quantity | null {
  if (value === null || value === undefined) return null;
  return toQuantity(String(value));
}

