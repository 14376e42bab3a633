/**
 * Report Formatter
 * ================
 *
 * Renders the build dependency list as a commented, timestamped
 * requirements file body. No trailing newline; the writer adds one.
 */

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

export const NO_BUILDDEPS_LINE = '# <no build dependencies found>';
export const PARTIAL_RESULT_LINE = '# <pip download failed, output may be incomplete!>';

/**
 * Input to report rendering.
 */
export interface ReportInput {
  builddeps: readonly string[];
  isPartial: boolean;
  /** Tool name for the header line */
  generator: string;
  /** Header timestamp (default: now) */
  now?: Date;
}

/**
 * Format a date in local time as `Mon DD YYYY HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const month = MONTHS[date.getMonth()] ?? '???';
  return (
    `${month} ${pad(date.getDate())} ${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Render the report text.
 */
export function formatReport(input: ReportInput): string {
  const lines = [`# Generated by ${input.generator} on ${formatTimestamp(input.now ?? new Date())}`];

  if (input.builddeps.length > 0) {
    lines.push(...[...input.builddeps].sort());
  } else {
    lines.push(NO_BUILDDEPS_LINE);
  }

  if (input.isPartial) {
    lines.push(PARTIAL_RESULT_LINE);
  }

  return lines.join('\n');
}
