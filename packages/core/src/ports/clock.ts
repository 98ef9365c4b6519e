export type Milliseconds = number

export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}
