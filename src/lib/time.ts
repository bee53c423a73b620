import { MalformedTimeError } from './errors';
import type { GroupPeriod, UtcInstant, ValidityPeriod } from './types';

// Day/hour/minute groups are UTC and carry no month or year. Day numbers are
// compared as plain digits. A period whose end day is smaller than its start
// day is only read as crossing a month end when it starts on the 28th or later,
// ends by the 2nd and spans no more than one forecast.

const pad2 = (n: number) => n.toString().padStart(2, '0');

export function ordinalLabel(day: number): string {
  const lastTwo = day % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return `${day}th`;
  switch (day % 10) {
    case 1:
      return `${day}st`;
    case 2:
      return `${day}nd`;
    case 3:
      return `${day}rd`;
    default:
      return `${day}th`;
  }
}

function checkRange(token: string, label: string, value: number, min: number, max: number) {
  if (value < min || value > max) {
    throw new MalformedTimeError(token, `${label} ${value} is outside ${min}-${max}`);
  }
}

// DDHHMM; callers strip the Z of a 201650Z group
export function parseIssueTime(text: string, token: string = text): UtcInstant {
  const match = text.match(/^(\d{2})(\d{2})(\d{2})$/);
  if (!match) {
    throw new MalformedTimeError(token, 'expected six digits DDHHMM');
  }

  const day = parseInt(match[1], 10);
  const hour = parseInt(match[2], 10);
  const minute = parseInt(match[3], 10);
  checkRange(token, 'day', day, 1, 31);
  checkRange(token, 'hour', hour, 0, 23);
  checkRange(token, 'minute', minute, 0, 59);

  return { day, hour, minute };
}

// DDHH with hour 24 meaning 00 of the next day
export function parseDayHour(text: string, token: string = text): UtcInstant {
  const match = text.match(/^(\d{2})(\d{2})$/);
  if (!match) {
    throw new MalformedTimeError(token, 'expected four digits DDHH');
  }

  const day = parseInt(match[1], 10);
  const hour = parseInt(match[2], 10);
  checkRange(token, 'day', day, 1, 31);
  checkRange(token, 'hour', hour, 0, 24);

  if (hour === 24) {
    return { day: day === 31 ? 1 : day + 1, hour: 0, minute: 0 };
  }
  return { day, hour, minute: 0 };
}

const MAX_FORECAST_HOURS = 30;

function timelineHours(instant: UtcInstant): number {
  return instant.day * 24 + instant.hour + instant.minute / 60;
}

// Shortest span across a month end, taking the start day as the month's last
function monthEndSpanHours(from: UtcInstant, to: UtcInstant): number {
  return 24 - from.hour + (to.day - 1) * 24 + to.hour;
}

function crossesMonthEnd(from: UtcInstant, to: UtcInstant): boolean {
  return from.day >= 28 && to.day <= 2 && monthEndSpanHours(from, to) <= MAX_FORECAST_HOURS;
}

// DDHH/DDHH
export function parseValidityToken(token: string): ValidityPeriod {
  const halves = token.split('/');
  if (halves.length !== 2) {
    throw new MalformedTimeError(token, 'expected DDHH/DDHH');
  }

  const from = parseDayHour(halves[0], token);
  const to = parseDayHour(halves[1], token);

  if (to.day < from.day) {
    if (!crossesMonthEnd(from, to)) {
      throw new MalformedTimeError(token, 'period ends before it starts');
    }
  } else if (timelineHours(to) <= timelineHours(from)) {
    throw new MalformedTimeError(token, 'period ends before it starts');
  }

  return { from, to };
}

// FMDDHHMM
export function parseFromTime(token: string): UtcInstant {
  if (!token.startsWith('FM')) {
    throw new MalformedTimeError(token, 'expected FMDDHHMM');
  }
  return parseIssueTime(token.slice(2), token);
}

export function formatClock(instant: UtcInstant): string {
  return `${pad2(instant.hour)}:${pad2(instant.minute)}Z`;
}

export function formatInstant(instant: UtcInstant): string {
  return `${formatClock(instant)} on ${ordinalLabel(instant.day)}`;
}

export function formatPeriod(from: UtcInstant, to: UtcInstant): string {
  if (from.day === to.day) {
    return `${formatClock(from)} to ${formatClock(to)}`;
  }
  return `${formatInstant(from)} to ${formatInstant(to)}`;
}

export const PERIOD_NOT_SPECIFIED = 'period not specified';

export function formatGroupPeriod(period: GroupPeriod | undefined): string {
  if (!period) return PERIOD_NOT_SPECIFIED;
  if (!period.to) return formatInstant(period.from);
  return formatPeriod(period.from, period.to);
}
