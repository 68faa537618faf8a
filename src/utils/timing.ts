/**
 * Suspension and clock helpers.
 *
 * Every wait in the orchestrator goes through an injected Sleep so the poll and
 * backoff intervals stay fixed in production and collapse to zero in tests.
 */

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => Date;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export const systemClock: Clock = () => new Date();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Batch date (YYYY-MM-DD) of an instant, in UTC.
 */
export function toBatchDate(instant: Date): string {
  return `${instant.getUTCFullYear()}-${pad(instant.getUTCMonth() + 1)}-${pad(instant.getUTCDate())}`;
}

/**
 * Timestamp literal accepted by a TIMESTAMP type hint: YYYY-MM-DD HH:MM:SS.mmm (UTC).
 */
export function toSqlTimestamp(instant: Date): string {
  return (
    `${toBatchDate(instant)} ${pad(instant.getUTCHours())}:${pad(instant.getUTCMinutes())}:` +
    `${pad(instant.getUTCSeconds())}.${pad(instant.getUTCMilliseconds(), 3)}`
  );
}

/** Minutes since UTC midnight. */
export function minutesOfDay(instant: Date): number {
  return instant.getUTCHours() * 60 + instant.getUTCMinutes();
}
