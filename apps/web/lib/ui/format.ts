const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const amountFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** 1234 → "1,234" */
export function formatCount(value: number): string {
  return countFormat.format(value);
}

/** Damage in thousands of US$: 500000 → "500,000.00" */
export function formatDamage(value: number): string {
  return amountFormat.format(value);
}

export function formatHover(args: { location: string; totalDeaths: number; totalDamage: number }): string[] {
  return [
    args.location,
    `Total Deaths: ${formatCount(args.totalDeaths)}`,
    `Total Damage: ${formatDamage(args.totalDamage)}`,
  ];
}
