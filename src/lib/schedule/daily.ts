/**
 * Runs a task once a day at a wall-clock time in a given time zone
 */

import { createLogger } from "../logger";

const log = createLogger("scheduler");

const DAY_MS = 24 * 60 * 60 * 1000;

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(date);

  const value = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");

  return {
    year: value("year"),
    month: value("month"),
    day: value("day"),
    hour: value("hour"),
    minute: value("minute"),
    second: value("second"),
  };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds
 */
export function timeZoneOffsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(date.getTime() / 1000) * 1000;
}

export function parseTimeOfDay(time: string): { hour: number; minute: number } {
  const match = time.match(/^([01]?\d|2[0-3]):([0-5]\d)$/);
  if (!match) {
    throw new Error(`Invalid time of day "${time}", expected HH:MM`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * First instant strictly after `now` whose wall-clock time in `timeZone` is `time`
 */
export function nextRunAt(now: Date, time: string, timeZone: string): Date {
  const { hour, minute } = parseTimeOfDay(time);
  const today = zonedParts(now, timeZone);
  let localMs = Date.UTC(today.year, today.month - 1, today.day, hour, minute, 0);

  for (;;) {
    // Resolve with the offset at the guessed instant so DST transitions land correctly
    let instant = localMs - timeZoneOffsetMs(now, timeZone);
    instant = localMs - timeZoneOffsetMs(new Date(instant), timeZone);
    if (instant > now.getTime()) {
      return new Date(instant);
    }
    localMs += DAY_MS;
  }
}

export type ScheduledTask = () => Promise<void>;

export interface DailySchedulerOptions {
  now?: () => Date;
}

export class DailyScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight = false;
  private nextRun: Date | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly time: string,
    private readonly timeZone: string,
    private readonly task: ScheduledTask,
    options: DailySchedulerOptions = {}
  ) {
    parseTimeOfDay(time);
    this.now = options.now ?? (() => new Date());
  }

  get nextRunTime(): Date | null {
    return this.nextRun;
  }

  get active(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.arm();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;
  }

  /**
   * Run the task immediately. Returns false if a run was already in flight.
   */
  async runNow(): Promise<boolean> {
    if (this.inFlight) {
      log.warn("Previous run still in progress, skipping");
      return false;
    }

    this.inFlight = true;
    try {
      await this.task();
    } catch (error) {
      log.error("Scheduled task failed", error);
    } finally {
      this.inFlight = false;
    }
    return true;
  }

  private arm(previous?: Date): void {
    const now = this.now();
    // Timers may fire slightly early; never re-arm for the run just due
    const from = previous && previous > now ? previous : now;
    const next = nextRunAt(from, this.time, this.timeZone);
    this.nextRun = next;
    log.info(`Next run at ${next.toISOString()} (${this.time} ${this.timeZone})`);

    this.timer = setTimeout(() => {
      this.arm(next);
      void this.runNow();
    }, Math.max(0, next.getTime() - now.getTime()));
  }
}
