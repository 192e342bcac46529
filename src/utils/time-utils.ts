/**
 * Time Utilities
 * Date formatting and validation for tool arguments
 */

export class TimeUtils {
  /**
   * Local calendar date in YYYY-MM-DD format
   */
  static getCurrentDate(now: Date = new Date()): string {
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  /**
   * Validate date format (YYYY-MM-DD) and that the day exists
   */
  static isValidDate(dateStr: string): boolean {
    const dateRegex = /^\d{4}-\d{2}-\d{2}$/;
    if (!dateRegex.test(dateStr)) return false;

    const date = new Date(`${dateStr}T00:00:00Z`);
    if (Number.isNaN(date.getTime())) return false;
    return date.toISOString().startsWith(dateStr);
  }

  /**
   * Validate an ISO 8601 date-time such as 2024-05-01T08:30 or 2024-05-01T08:30:00+02:00
   */
  static isValidDateTime(value: string): boolean {
    const dateTimeRegex = /^(\d{4}-\d{2}-\d{2})T([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
    const match = dateTimeRegex.exec(value);
    return match !== null && TimeUtils.isValidDate(match[1]);
  }
}
