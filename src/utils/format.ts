// ---------------------------------------------------------------------------
// Formatting helpers for alert messages
// ---------------------------------------------------------------------------

const SIZE_UNITS = ['', 'K', 'M', 'G', 'T', 'P', 'E', 'Z'];

/**
 * Format a byte count in base 10, the way the cluster's web UI shows sizes.
 *
 * @example
 * humanizeBytes(0)               // "0.0B"
 * humanizeBytes(1_500)           // "1.5KB"
 * humanizeBytes(960_000_000_000) // "960.0GB"
 */
export function humanizeBytes(bytes: number, suffix = 'B'): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (Math.abs(value) < 1000) {
      return `${value.toFixed(1)}${unit}${suffix}`;
    }
    value /= 1000;
  }
  return `${value.toFixed(1)}Y${suffix}`;
}

const alertStampFormat = new Intl.DateTimeFormat('en-US', {
  weekday: 'long',
  day: '2-digit',
  month: 'long',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
});

/**
 * Local-time stamp appended to every alert, e.g.
 * "Monday, 19. October 2026 02:05PM".
 */
export function formatAlertTimestamp(date: Date): string {
  const parts = alertStampFormat.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
  return (
    `${part('weekday')}, ${part('day')}. ${part('month')} ${part('year')} ` +
    `${part('hour')}:${part('minute')}${part('dayPeriod').toUpperCase()}`
  );
}

/** Minimal HTML escaping for values interpolated into alert bodies. */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
