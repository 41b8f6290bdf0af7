import { PickingStyle, type Decode, type TrackerConfig } from '@pileup-intel/contracts';
import type { ClockSource } from '../clock/ClockSource.js';
import { SessionTracker } from './SessionTracker.js';

export interface MultiTargetTrackerOptions {
  myCallsign: string;
  config: TrackerConfig;
  clock?: ClockSource;
}

export interface TargetScore {
  callsign: string;
  score: number;
}

/**
 * 同时跟踪多个目标，用于挑选最容易通联的一个
 */
export class MultiTargetTracker {
  private readonly options: MultiTargetTrackerOptions;
  private readonly trackers = new Map<string, SessionTracker>();

  constructor(options: MultiTargetTrackerOptions) {
    this.options = options;
  }

  addTarget(callsign: string, grid?: string): SessionTracker {
    const call = callsign.toUpperCase();
    const existing = this.trackers.get(call);
    if (existing) {
      return existing;
    }

    const tracker = new SessionTracker(this.options);
    tracker.setTarget(call, grid);
    this.trackers.set(call, tracker);
    return tracker;
  }

  removeTarget(callsign: string): boolean {
    return this.trackers.delete(callsign.toUpperCase());
  }

  getTracker(callsign: string): SessionTracker | undefined {
    return this.trackers.get(callsign.toUpperCase());
  }

  getTrackedTargets(): string[] {
    return [...this.trackers.keys()];
  }

  processDecode(decode: Decode): void {
    for (const tracker of this.trackers.values()) {
      tracker.processDecode(decode);
    }
  }

  setTxFrequency(frequency: number | null): void {
    for (const tracker of this.trackers.values()) {
      tracker.setTxFrequency(frequency);
    }
  }

  setTxStatus(enabled: boolean, calling?: string | null): void {
    for (const tracker of this.trackers.values()) {
      tracker.setTxStatus(enabled, calling);
    }
  }

  /**
   * 为每个有堆叠数据的目标打分
   * 堆叠越小越好（最多 50），我方排名（最多 30），挑选风格匹配（最多 20）
   */
  scoreTargets(): TargetScore[] {
    const scores: TargetScore[] = [];

    for (const [callsign, tracker] of this.trackers) {
      const pileup = tracker.getPileupInfo();
      if (!pileup) {
        continue;
      }

      let score = pileup.size === 0 ? 50 : Math.max(0, 50 - pileup.size * 5);

      const rank = pileup.yourRank.kind === 'known' ? pileup.yourRank.rank : null;
      if (rank !== null) {
        score += Math.max(0, 30 - (rank - 1) * 10);
      }

      const pattern = tracker.getTargetBehavior()?.pattern;
      if (pattern?.style === PickingStyle.LOUDEST_FIRST && rank !== null) {
        if (rank === 1) {
          score += 20;
        } else if (rank <= 3) {
          score += 10;
        }
      }

      scores.push({ callsign, score });
    }

    return scores;
  }

  getBestTarget(): string | null {
    let best: TargetScore | null = null;
    for (const entry of this.scoreTargets()) {
      if (!best || entry.score > best.score) {
        best = entry;
      }
    }
    return best ? best.callsign : null;
  }
}
