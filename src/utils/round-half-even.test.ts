import {roundHalfEven} from './round-half-even';


describe('roundHalfEven function tests', () => {

  test('Rounds exact halves to the even digit', () => {
    expect(roundHalfEven(0.125)).toBe(0.12);
    expect(roundHalfEven(0.375)).toBe(0.38);
    expect(roundHalfEven(0.625)).toBe(0.62);
    expect(roundHalfEven(1.125)).toBe(1.12);
  });

  test('Rounds everything else to the nearest value', () => {
    expect(roundHalfEven(0.8333333333333334)).toBe(0.83);
    expect(roundHalfEven(0.4999)).toBe(0.5);
    expect(roundHalfEven(54.4042)).toBe(54.4);
  });

  test('Handles negative halves', () => {
    expect(roundHalfEven(-0.625)).toBe(-0.62);
  });

  test('Respects the number of decimal places', () => {
    expect(roundHalfEven(2.5, 0)).toBe(2);
    expect(roundHalfEven(3.5, 0)).toBe(4);
    expect(roundHalfEven(0.0625, 3)).toBe(0.062);
  });

});
