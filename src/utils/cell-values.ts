// What a tabular source can hand us for a single cell.
export type CellValue = string | number | Date | null | undefined;


export function isMissing(value: CellValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'number') return Number.isNaN(value);
  return Number.isNaN(value.getTime());
}


export function cellToString(value: CellValue): string | undefined {
  if (isMissing(value)) return undefined;
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}


// Lenient numeric coercion: anything that isn't a finite number comes back as undefined.
export function toFiniteNumber(value: CellValue): number | undefined {
  let n: number | undefined;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value.trim());
  }
  return n !== undefined && Number.isFinite(n) ? n : undefined;
}
