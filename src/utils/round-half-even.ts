// Rounds to the given number of decimal places, with exact halves going to the even digit (e.g. 0.625 -> 0.62, 0.375 -> 0.38).
// The value is scaled first, so a half is judged on the scaled float.
export function roundHalfEven(value: number, decimals = 2): number {

  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const remainder = scaled - floor;

  let rounded: number;
  if (remainder > 0.5) {
    rounded = floor + 1;
  } else if (remainder < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }

  return rounded / factor;

}
