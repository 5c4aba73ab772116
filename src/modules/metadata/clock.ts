export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date()
}

/** Clock pinned to one instant. */
export function fixedClock(instant: Date | string | number): Clock {
  const time = new Date(instant).getTime()
  return {
    now: () => new Date(time)
  }
}
