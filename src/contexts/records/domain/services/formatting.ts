/**
 * 日付・数値の表示用フォーマット（ローカル時刻）
 */

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** yyyy-MM-dd */
export const formatIsoDate = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;

/** dd-MM-yyyy */
export const formatDisplayDate = (date: Date): string =>
  `${pad2(date.getDate())}-${pad2(date.getMonth() + 1)}-${date.getFullYear()}`;

/** HH:mm:ss */
export const formatTime = (date: Date): string =>
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

/** yyyy-MM-dd HH:mm:ss */
export const formatTimestamp = (date: Date): string =>
  `${formatIsoDate(date)} ${formatTime(date)}`;

/**
 * 暦年の差（誕生日や入職日を考慮しない）
 */
export const calendarYearsBetween = (from: Date, to: Date): number =>
  to.getFullYear() - from.getFullYear();

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * 日付部分だけで数えた経過日数
 */
export const daysBetween = (from: Date, to: Date): number => {
  const start = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const end = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((end - start) / MS_PER_DAY);
};

export const subtractYears = (date: Date, years: number): Date => {
  const result = new Date(date.getTime());
  result.setFullYear(result.getFullYear() - years);
  return result;
};
