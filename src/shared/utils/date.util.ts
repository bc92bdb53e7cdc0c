// src/shared/utils/date.util.ts
import { CalendarDate, DateBounds, RecurrenceRule } from '../types/common.types';

interface DateParts {
    year: number;
    month: number;
    day: number;
}

const pad = (value: number, width: number): string => value.toString().padStart(width, '0');

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const isDigits = (value: string): boolean => {
    if (value.length === 0) return false;
    for (const ch of value) {
        if (ch < '0' || ch > '9') return false;
    }
    return true;
};

export class DateUtil {
    static isLeapYear(year: number): boolean {
        return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    }

    static daysInMonth(year: number, month: number): number {
        return month === 2 && DateUtil.isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
    }

    static parse(value: string): DateParts | null {
        const parts = value.split('-');
        if (parts.length !== 3) return null;

        const [yearText, monthText, dayText] = parts;
        if (yearText.length !== 4 || monthText.length !== 2 || dayText.length !== 2) return null;
        if (!isDigits(yearText) || !isDigits(monthText) || !isDigits(dayText)) return null;

        const year = Number(yearText);
        const month = Number(monthText);
        const day = Number(dayText);

        if (year < 1 || month < 1 || month > 12) return null;
        if (day < 1 || day > DateUtil.daysInMonth(year, month)) return null;

        return { year, month, day };
    }

    /**
     * True for a real `YYYY-MM-DD` calendar date (2024-02-30 is rejected).
     */
    static isValidCalendarDate(value: string): value is CalendarDate {
        return DateUtil.parse(value) !== null;
    }

    static format(year: number, month: number, day: number): CalendarDate {
        return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
    }

    static today(now: Date = new Date()): CalendarDate {
        return DateUtil.format(now.getFullYear(), now.getMonth() + 1, now.getDate());
    }

    static monthBounds(year: number, month: number): DateBounds {
        return {
            start: DateUtil.format(year, month, 1),
            end: DateUtil.format(year, month, DateUtil.daysInMonth(year, month))
        };
    }

    static yearBounds(year: number): DateBounds {
        return {
            start: DateUtil.format(year, 1, 1),
            end: DateUtil.format(year, 12, 31)
        };
    }

    /**
     * Next date a recurring template falls due after `date`.
     * Month and year steps clamp to the last day of the target month.
     * Returns null for `none`.
     */
    static nextOccurrence(date: CalendarDate, rule: RecurrenceRule): CalendarDate | null {
        const parts = DateUtil.parse(date);
        if (!parts || rule === 'none') return null;

        const { year, month, day } = parts;

        switch (rule) {
            case 'daily':
            case 'weekly': {
                let nextYear = year;
                let nextMonth = month;
                let nextDay = day + (rule === 'daily' ? 1 : 7);

                // a step of at most 7 days crosses at most one month end
                const length = DateUtil.daysInMonth(nextYear, nextMonth);
                if (nextDay > length) {
                    nextDay -= length;
                    nextMonth++;
                    if (nextMonth > 12) {
                        nextMonth = 1;
                        nextYear++;
                    }
                }
                return DateUtil.format(nextYear, nextMonth, nextDay);
            }
            case 'monthly': {
                const nextYear = month === 12 ? year + 1 : year;
                const nextMonth = month === 12 ? 1 : month + 1;
                return DateUtil.format(nextYear, nextMonth, Math.min(day, DateUtil.daysInMonth(nextYear, nextMonth)));
            }
            case 'yearly':
                return DateUtil.format(year + 1, month, Math.min(day, DateUtil.daysInMonth(year + 1, month)));
        }
    }
}
