import type { LogEntry, MeterName, OutcomeTier, Phase, QuarterLog } from './types';

export function info(message: string): LogEntry {
  return { kind: 'info', message };
}

export function event(message: string): LogEntry {
  return { kind: 'event', message };
}

export function meterChange(meter: MeterName, delta: number): LogEntry {
  return { kind: 'meterChange', meter, delta, message: `${meterLabel(meter)} ${formatSigned(delta)}` };
}

export function outcome(tier: OutcomeTier, source: string, action: string): LogEntry {
  return { kind: 'outcome', tier, source, message: `Outcome [${tier}] ${source}: ${action}` };
}

/** "+5", "-3", "0" */
export function formatSigned(n: number): string {
  return n > 0 ? `+${n}` : `${n}`;
}

export function meterLabel(meter: MeterName): string {
  return meter.charAt(0).toUpperCase() + meter.slice(1);
}

/**
 * Append-only entry buffer used while a phase handler runs.
 * Handlers push as they go and freeze into a QuarterLog at the end.
 */
export class LogBuilder {
  private readonly entries: LogEntry[] = [];

  constructor(private readonly quarterNumber: number, private readonly phase: Phase) {}

  info(message: string): this {
    this.entries.push(info(message));
    return this;
  }

  event(message: string): this {
    this.entries.push(event(message));
    return this;
  }

  add(entries: readonly LogEntry[]): this {
    this.entries.push(...entries);
    return this;
  }

  build(): QuarterLog {
    return { quarterNumber: this.quarterNumber, phase: this.phase, entries: [...this.entries] };
  }
}
