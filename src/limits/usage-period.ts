export interface UsagePeriod {
  /** `YYYY-MM` label of the UTC calendar month. */
  period: string;
  /** First day of the month, `YYYY-MM-01`. */
  start: string;
  /** First day of the following month; the period ends before it. */
  end: string;
}

function formatMonth(year: number, monthIndex: number): string {
  return `${String(year).padStart(4, '0')}-${String(monthIndex + 1).padStart(2, '0')}`;
}

export function usagePeriodFor(at: Date): UsagePeriod {
  const year = at.getUTCFullYear();
  const monthIndex = at.getUTCMonth();
  const period = formatMonth(year, monthIndex);
  const next = monthIndex === 11 ? formatMonth(year + 1, 0) : formatMonth(year, monthIndex + 1);

  return {
    period,
    start: `${period}-01`,
    end: `${next}-01`
  };
}
