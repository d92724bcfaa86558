import moment from "moment";

/**
 * Date and time formats stored in the attendance table.
 * Everything uses server-local time.
 */
export class DateUtils {
  static readonly DATE_FORMAT = "YYYY-MM-DD";
  static readonly TIME_FORMAT = "HH:mm:ss";
  static readonly DISPLAY_TIME_FORMAT = "hh:mm A";

  /**
   * Calendar date (YYYY-MM-DD)
   */
  static formatDate(date: Date | moment.Moment): string {
    return moment(date).format(DateUtils.DATE_FORMAT);
  }

  /**
   * Time of day (HH:mm:ss, 24-hour)
   */
  static formatTime(date: Date | moment.Moment): string {
    return moment(date).format(DateUtils.TIME_FORMAT);
  }

  /**
   * Convert a stored 24-hour time to 12-hour display form, e.g. 14:05:09 -> 02:05 PM.
   * Returns null for an empty value and the input unchanged when it cannot be parsed.
   */
  static formatTime12hr(time: string | null | undefined): string | null {
    if (!time) {
      return null;
    }

    const parsed = moment(time, DateUtils.TIME_FORMAT, true);
    if (!parsed.isValid()) {
      return time;
    }

    return parsed.format(DateUtils.DISPLAY_TIME_FORMAT);
  }
}

export default DateUtils;
