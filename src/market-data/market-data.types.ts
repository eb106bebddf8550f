export interface Bar {
  /** Exchange-local wall clock, `YYYY-MM-DDTHH:mm:ss`, no zone. */
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
}
