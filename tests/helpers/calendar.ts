/**
 * In-memory earnings calendar for resolver and runner tests
 */

import { CalendarRow, IsoDate } from '../../src/types';

export function fakeCalendar(byDate: Record<IsoDate, string[]> = {}, history: Record<string, IsoDate[]> = {}) {
    return {
        fetchByDate: jest.fn(async (date: IsoDate): Promise<CalendarRow[]> =>
            (byDate[date] ?? []).map((symbol) => ({ symbol }))
        ),
        fetchReportDates: jest.fn(async (symbol: string): Promise<IsoDate[]> => history[symbol] ?? []),
    };
}
