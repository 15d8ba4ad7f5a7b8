import {padStart} from 'lodash';
import {CellValue, isMissing} from '../../utils/cell-values';
import {TimeOfDay} from './time-of-day.interface';


const amPmRegex = /^(\d{1,2}):(\d{2})([AP])$/;
const hoursMinutesRegex = /^(\d{1,2}):(\d{2})$/;
const digitsRegex = /^\d+$/;


function pad2(value: number | string): string {
  return padStart(String(value), 2, '0');
}


//-------------------------------------------------
// Normalise
//-------------------------------------------------
// The operators have logged times in all sorts of ways over the years, e.g. '800', '1430', '1:24P', '9:05'.
// Returns undefined when there's no time at all. Anything we don't recognise is returned as is (upper-cased) and left for parseTimeOfDay to accept or reject.
export function normalizeTimeString(value: CellValue): string | undefined {

  if (isMissing(value)) {
    return undefined;
  }

  if (value instanceof Date) {
    return `${pad2(value.getUTCHours())}:${pad2(value.getUTCMinutes())}:${pad2(value.getUTCSeconds())}`;
  }

  const str = String(value).trim().toUpperCase();

  // e.g. '1:24A' or '1:24P'
  const amPmMatch = str.match(amPmRegex);
  if (amPmMatch) {
    let hour = Number(amPmMatch[1]);
    const meridiem = amPmMatch[3];
    if (meridiem === 'P' && hour !== 12) {
      hour += 12;
    } else if (meridiem === 'A' && hour === 12) {
      hour = 0;
    }
    return `${pad2(hour)}:${amPmMatch[2]}:00`;
  }

  // e.g. '1:23' or '12:34'
  const hoursMinutesMatch = str.match(hoursMinutesRegex);
  if (hoursMinutesMatch) {
    return `${pad2(Number(hoursMinutesMatch[1]))}:${hoursMinutesMatch[2]}:00`;
  }

  if (digitsRegex.test(str)) {
    if (str.length === 3) {
      return `${str[0]}:${str.slice(1)}:00`;
    }
    if (str.length === 4) {
      return `${str.slice(0, 2)}:${str.slice(2)}:00`;
    }
    if (str.length === 5) {
      // N.B. the last digit ends up as an unpadded seconds field, e.g. '12345' -> '12:34:5'. That's how these have always been read, so leave it be.
      return `${str.slice(0, 2)}:${str.slice(2, 4)}:${str.slice(4)}`;
    }
  }

  return str;

}


//-------------------------------------------------
// Parse
//-------------------------------------------------
const timeOfDayRegex = /^(\d{1,2}):(\d{1,2})(?::(\d{1,2}))?\s*(A|P|AM|PM|A\.M\.|P\.M\.)?$/i;

// Second pass over a normalised value. Returns undefined unless it's a real time of day.
export function parseTimeOfDay(value: CellValue): TimeOfDay | undefined {

  if (isMissing(value)) {
    return undefined;
  }

  const match = String(value).trim().match(timeOfDayRegex);
  if (!match) {
    return undefined;
  }

  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  const meridiem = match[4] ? match[4].charAt(0).toUpperCase() : undefined;

  if (meridiem) {
    if (hours < 1 || hours > 12) return undefined;
    if (meridiem === 'P' && hours !== 12) hours += 12;
    if (meridiem === 'A' && hours === 12) hours = 0;
  }

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  return {hours, minutes, seconds};

}


export function formatTimeOfDay(time: TimeOfDay): string {
  return `${pad2(time.hours)}:${pad2(time.minutes)}:${pad2(time.seconds)}`;
}


// Both passes together. This is what the rest of the pipeline uses.
export function normalizeAndParseTime(value: CellValue): TimeOfDay | undefined {
  return parseTimeOfDay(normalizeTimeString(value));
}
