import { DateTime } from 'luxon';
import {
  Allocation,
  DatedCommitment,
  SlotOccurrence,
  SlotState,
  TimeWindow,
  WeeklyCommitment,
  WEEKDAYS,
  Weekday,
} from './types';

export interface SlotAllocatorOptions {
  timezone: string;
  defaultCapacity: number;
}

interface Candidate {
  occurrence: SlotOccurrence;
  startsAt: DateTime;
  distance: number;
  load: number;
  capacity: number;
}

/** ISO weekday number (Mon = 1) of a weekday label. */
export function weekdayNumber(day: Weekday): number {
  return WEEKDAYS.indexOf(day) + 1;
}

function minutesOf(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

function overlaps(aStart: string, aEnd: string, bStart: string, bEnd: string): boolean {
  return minutesOf(aStart) < minutesOf(bEnd) && minutesOf(bStart) < minutesOf(aEnd);
}

function atTime(date: DateTime, time: string): DateTime {
  const [hour, minute] = time.split(':').map(Number);
  return date.set({ hour, minute, second: 0, millisecond: 0 });
}

/**
 * Dates of the window's ISO week and the following one, the span the
 * allocator searches.
 */
export function searchRange(window: TimeWindow, timezone: string): { from: string; to: string } {
  const weekStart = DateTime.fromISO(window.start, { zone: timezone }).startOf('week');
  return {
    from: weekStart.toISODate() ?? '',
    to: weekStart.plus({ weeks: 1 }).endOf('week').toISODate() ?? '',
  };
}

/**
 * Picks a weekly slot occurrence for a reschedule request. Ranking: distance
 * to the requested window (0 when overlapping), then current load, then
 * start time, then slot id. Occurrences at capacity or clashing with one of
 * the student's commitments are skipped. Identical inputs give identical
 * picks.
 */
export class SlotAllocator {
  constructor(private readonly options: SlotAllocatorOptions) {}

  allocate(subject: string, requestedWindow: TimeWindow, bookings: SlotState): Allocation {
    const zone = this.options.timezone;
    const windowStart = DateTime.fromISO(requestedWindow.start, { zone });
    const windowEnd = DateTime.fromISO(requestedWindow.end, { zone });
    if (!windowStart.isValid || !windowEnd.isValid || windowEnd <= windowStart) {
      throw new RangeError(`Invalid requested window for ${subject}: ${requestedWindow.start} - ${requestedWindow.end}`);
    }

    const earliestDay = windowStart.startOf('day');
    const weekStart = windowStart.startOf('week');
    const loadByOccurrence = new Map<string, number>();
    for (const entry of bookings.load) {
      loadByOccurrence.set(`${entry.slotId}@${entry.date}`, entry.students);
    }

    const candidates: Candidate[] = [];
    for (const week of [0, 1]) {
      for (const slot of bookings.weeklySlots) {
        const day = weekStart.plus({ weeks: week, days: weekdayNumber(slot.day) - 1 });
        if (day < earliestDay) continue;

        const date = day.toISODate() ?? '';
        const occurrence: SlotOccurrence = { slot, date, start: slot.start, end: slot.end };
        const load = loadByOccurrence.get(`${slot.id}@${date}`) ?? 0;
        const capacity = slot.capacity ?? this.options.defaultCapacity;
        if (load >= capacity) continue;
        if (this.clashes(occurrence, bookings.weeklyCommitments, bookings.datedCommitments)) continue;

        const startsAt = atTime(day, slot.start);
        const endsAt = atTime(day, slot.end);
        candidates.push({
          occurrence,
          startsAt,
          distance: distanceInMinutes(startsAt, endsAt, windowStart, windowEnd),
          load,
          capacity,
        });
      }
    }

    candidates.sort(
      (a, b) =>
        a.distance - b.distance ||
        a.load - b.load ||
        a.startsAt.toMillis() - b.startsAt.toMillis() ||
        a.occurrence.slot.id - b.occurrence.slot.id
    );

    const best = candidates[0];
    if (!best) {
      return { ok: false, reason: 'exhausted' };
    }
    return { ok: true, occurrence: best.occurrence, load: best.load, capacity: best.capacity };
  }

  private clashes(
    occurrence: SlotOccurrence,
    weekly: WeeklyCommitment[],
    dated: DatedCommitment[]
  ): boolean {
    const day = occurrence.slot.day;
    return (
      weekly.some((c) => c.day === day && overlaps(c.start, c.end, occurrence.start, occurrence.end)) ||
      dated.some((c) => c.date === occurrence.date && overlaps(c.start, c.end, occurrence.start, occurrence.end))
    );
  }
}

function distanceInMinutes(start: DateTime, end: DateTime, windowStart: DateTime, windowEnd: DateTime): number {
  if (start < windowEnd && windowStart < end) return 0;
  const gap = end <= windowStart ? windowStart.diff(end, 'minutes') : start.diff(windowEnd, 'minutes');
  return Math.round(gap.minutes);
}
