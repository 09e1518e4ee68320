// P&L accounting periods. Both are UTC so a halt never depends on host TZ.

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** UTC calendar day, e.g. 2024-03-09 */
export function dayKey(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
}

/** ISO-8601 week, e.g. 2024-W10. Weeks start on Monday. */
export function weekKey(ms: number): string {
  const source = new Date(ms);
  const d = new Date(
    Date.UTC(
      source.getUTCFullYear(),
      source.getUTCMonth(),
      source.getUTCDate(),
    ),
  );
  const dayNum = d.getUTCDay() || 7;
  // Thursday of the same week decides the ISO year
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return `${d.getUTCFullYear()}-W${pad2(week)}`;
}
