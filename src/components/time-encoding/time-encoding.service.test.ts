import {normalizeTimeString, parseTimeOfDay, formatTimeOfDay, normalizeAndParseTime} from './time-encoding.service';


describe('Testing of normalizeTimeString function', () => {

  test('Handles 3 digit times', () => {
    expect(normalizeTimeString('123')).toBe('1:23:00');
  });

  test('Handles 4 digit times', () => {
    expect(normalizeTimeString('1234')).toBe('12:34:00');
  });

  test('Keeps the legacy unpadded seconds for 5 digit times', () => {
    expect(normalizeTimeString('12345')).toBe('12:34:5');
  });

  test('Handles numeric cells', () => {
    expect(normalizeTimeString(800)).toBe('8:00:00');
  });

  test('Pads hours and minutes', () => {
    expect(normalizeTimeString('12:34')).toBe('12:34:00');
    expect(normalizeTimeString('9:05')).toBe('09:05:00');
  });

  test('Converts PM times to 24 hour', () => {
    expect(normalizeTimeString('1:24P')).toBe('13:24:00');
    expect(normalizeTimeString('12:10p')).toBe('12:10:00');
  });

  test('Converts AM times to 24 hour', () => {
    expect(normalizeTimeString('1:24A')).toBe('01:24:00');
    expect(normalizeTimeString('12:15a')).toBe('00:15:00');
  });

  test('Passes through anything else, upper-cased', () => {
    expect(normalizeTimeString('08:00:00')).toBe('08:00:00');
    expect(normalizeTimeString(' noon ')).toBe('NOON');
    expect(normalizeTimeString('123456')).toBe('123456');
  });

  test('Returns undefined when there is no time', () => {
    expect(normalizeTimeString(undefined)).toBeUndefined();
    expect(normalizeTimeString(null)).toBeUndefined();
    expect(normalizeTimeString('  ')).toBeUndefined();
  });

  test('Uses the UTC clock of date cells', () => {
    expect(normalizeTimeString(new Date('2020-05-01T14:05:09Z'))).toBe('14:05:09');
  });

});


describe('Testing of parseTimeOfDay function', () => {

  test('Parses a canonical time', () => {
    expect(parseTimeOfDay('13:24:00')).toEqual({hours: 13, minutes: 24, seconds: 0});
  });

  test('Parses the unpadded seconds of a 5 digit time', () => {
    expect(parseTimeOfDay('12:34:5')).toEqual({hours: 12, minutes: 34, seconds: 5});
  });

  test('Parses times without seconds', () => {
    expect(parseTimeOfDay('7:45')).toEqual({hours: 7, minutes: 45, seconds: 0});
  });

  test('Understands AM/PM suffixes', () => {
    expect(parseTimeOfDay('8:00 PM')).toEqual({hours: 20, minutes: 0, seconds: 0});
    expect(parseTimeOfDay('12:30 am')).toEqual({hours: 0, minutes: 30, seconds: 0});
  });

  test('Rejects values that are not a time of day', () => {
    expect(parseTimeOfDay('25:00:00')).toBeUndefined();
    expect(parseTimeOfDay('12:60:00')).toBeUndefined();
    expect(parseTimeOfDay('13:00 PM')).toBeUndefined();
    expect(parseTimeOfDay('NOON')).toBeUndefined();
    expect(parseTimeOfDay(undefined)).toBeUndefined();
  });

});


describe('Testing of formatTimeOfDay function', () => {

  test('Zero pads every field', () => {
    expect(formatTimeOfDay({hours: 8, minutes: 0, seconds: 5})).toBe('08:00:05');
  });

});


describe('Testing of normalizeAndParseTime function', () => {

  test('Turns a 3 digit time into a time of day', () => {
    const time = normalizeAndParseTime('800');
    expect(time).toEqual({hours: 8, minutes: 0, seconds: 0});
  });

  test('Rejects 4 digit times that are out of range', () => {
    expect(normalizeAndParseTime('2575')).toBeUndefined();
  });

});
