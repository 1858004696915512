import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar day written exactly as `YYYY-MM-DD`. */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DAY.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Validates the `date` query parameter before any handler touches the store.
 */
@Injectable()
export class ParseDatePipe implements PipeTransform<unknown, string> {
  transform(value: unknown): string {
    if (value === undefined || value === null || value === '') {
      throw new BadRequestException('Query parameter date is required (YYYY-MM-DD)');
    }
    if (typeof value !== 'string' || !isCalendarDate(value)) {
      throw new BadRequestException('Invalid date format. Use YYYY-MM-DD');
    }
    return value;
  }
}
