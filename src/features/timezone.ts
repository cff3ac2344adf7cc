const MICROS_PER_SECOND = 1_000_000;

const WEEKDAY_NUMBERS: Record<string, number> = {
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
  Sunday: 7
};

export interface LocalTime {
  /** `YYYY-MM-DDTHH:MM:SS.ffffff` wall-clock time, no offset. */
  timestampLocal: string;
  localDate: string;
  hour: number;
  weekday: string;
  /** ISO numbering, Monday = 1. */
  weekdayNumber: number;
}

export type Localizer = (epochMicros: number) => LocalTime;

export function createLocalizer(timeZone: string): Localizer {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    weekday: 'long'
  });

  return (epochMicros) => {
    const seconds = Math.floor(epochMicros / MICROS_PER_SECOND);
    const fraction = epochMicros - seconds * MICROS_PER_SECOND;
    const parts: Record<string, string> = {};
    for (const part of formatter.formatToParts(new Date(seconds * 1000))) {
      parts[part.type] = part.value;
    }
    const year = parts.year ?? '0000';
    const month = parts.month ?? '01';
    const day = parts.day ?? '01';
    const hour = parts.hour ?? '00';
    const minute = parts.minute ?? '00';
    const second = parts.second ?? '00';
    const weekday = parts.weekday ?? '';
    const localDate = `${year}-${month}-${day}`;

    return {
      timestampLocal: `${localDate}T${hour}:${minute}:${second}.${String(fraction).padStart(6, '0')}`,
      localDate,
      hour: Number.parseInt(hour, 10),
      weekday,
      weekdayNumber: WEEKDAY_NUMBERS[weekday] ?? 0
    };
  };
}
