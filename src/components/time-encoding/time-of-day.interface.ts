export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}
