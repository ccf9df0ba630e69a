import { toUtcIso, utcNowIso } from "../time.js";

export interface Clock {
  now(): Date;
  nowIso(): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  nowIso(): string {
    return utcNowIso();
  }
}

export class FixedClock implements Clock {
  private readonly instant: Date;

  constructor(instant: Date | string) {
    this.instant = typeof instant === "string" ? new Date(instant) : instant;
  }

  now(): Date {
    return new Date(this.instant.getTime());
  }

  nowIso(): string {
    return toUtcIso(this.instant);
  }
}
