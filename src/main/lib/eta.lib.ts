/**
 * Transfer ETA estimation
 * Tracks throughput per second over a short window and derives the time left
 */

import { EtaEstimate } from '../interfaces/transfer.interface';
import { ETA, TIMING } from '../utils/constants';
import { countOf } from './format.lib';

export type Clock = () => number;

/**
 * Human readable remaining time. Non-finite input means the speed is unknown.
 */
export function formatEta(seconds: number): string {
  if (!Number.isFinite(seconds)) {
    return ETA.UNKNOWN;
  }

  const sec = Math.max(0, Math.trunc(seconds));

  if (sec > ETA.HOURS_THRESHOLD_SECS) {
    const hours = Math.floor(sec / 3600);
    const minutes = Math.floor((sec % 3600) / 60);
    return `${countOf(hours, 'hour', 'hours')} ${countOf(minutes, 'minute', 'minutes')}`;
  }

  if (sec > ETA.MINUTES_THRESHOLD_SECS) {
    const minutes = Math.floor(sec / 60);
    return `${countOf(minutes, 'minute', 'minutes')} ${countOf(sec % 60, 'second', 'seconds')}`;
  }

  return countOf(sec, 'second', 'seconds');
}

export class EtaEstimator {
  totalLen: number;
  private totalTransferred = 0;
  private transferredThisSec = 0;
  // newest first
  private history: number[] = [];
  private lastSecondAt: number | null = null;
  private secondsElapsed = 0;

  constructor(totalLen: number = 0, private readonly clock: Clock = Date.now) {
    this.totalLen = Math.max(0, totalLen);
  }

  get transferred(): number {
    return this.totalTransferred;
  }

  get elapsedSeconds(): number {
    return this.secondsElapsed;
  }

  get recentDeltas(): readonly number[] {
    return this.history;
  }

  /**
   * Whether no transfer has been measured since the last reset
   */
  get isPristine(): boolean {
    return this.lastSecondAt === null;
  }

  /**
   * Record the cumulative number of bytes transferred so far
   */
  stepWith(totalTransferred: number): void {
    // The counter is cumulative; a lower value adds nothing
    const delta = Math.max(0, totalTransferred - this.totalTransferred);
    this.transferredThisSec += delta;
    this.totalTransferred = totalTransferred;

    const now = this.clock();

    if (this.lastSecondAt === null) {
      this.lastSecondAt = now;
      return;
    }

    if (now - this.lastSecondAt >= TIMING.ETA_SECOND_MS) {
      this.secondsElapsed++;
      this.lastSecondAt = now;

      if (this.history.length === ETA.HISTORY_SIZE) {
        this.history.pop();
      }
      this.history.unshift(this.transferredThisSec);
      this.transferredThisSec = 0;
    }
  }

  prepareForNewTransfer(totalLen?: number): void {
    if (totalLen !== undefined) {
      this.totalLen = Math.max(0, totalLen);
    }
    this.totalTransferred = 0;
    this.transferredThisSec = 0;
    this.history = [];
    this.secondsElapsed = 0;
    this.lastSecondAt = null;
  }

  estimate(): EtaEstimate {
    const sum = this.history.reduce((acc, value) => acc + value, 0);
    const speed = this.history.length > 0 ? sum / this.history.length : 0;
    const remaining = this.totalLen - this.totalTransferred;
    const seconds = remaining / speed;

    return { speed, remaining, seconds, text: formatEta(seconds) };
  }

  estimateText(): string {
    return this.estimate().text;
  }
}
