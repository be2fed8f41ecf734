/**
 * Round a dollar amount to cents (half away from zero).
 */
export function roundToCents(value: number): number {
  const cents = Math.round(Math.abs(value) * 100);
  return (Math.sign(value) * cents) / 100;
}

export function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}
