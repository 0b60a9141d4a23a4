/**
 * Inventory domain types
 */

/** One leaf product's stock count at capture time */
export interface StockRecord {
  id: number;
  name: string;
  quantity: number;
}

/** Quantity difference between two snapshots; null = absent on that side */
export interface StockChange {
  id: number;
  name: string;
  previous: number | null;
  current: number | null;
  delta: number;
}

/** Legacy cartridge report row, display only */
export interface CartridgeStatusRow {
  cartridge: string;
  letter: string;
  part: string;
  level: number;
  status: string;
}
