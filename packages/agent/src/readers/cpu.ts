import os from "node:os";
import type { PowerReader } from "./types";

type CpuTimes = os.CpuInfo["times"];

interface CpuTotals {
  busy: number;
  total: number;
}

export interface CpuPowerReaderOptions {
  tdpW: number;
  cpus?: () => os.CpuInfo[];
}

function totals(cpus: os.CpuInfo[]): CpuTotals {
  return cpus.reduce<CpuTotals>(
    (acc, cpu) => {
      const times: CpuTimes = cpu.times;
      const total = times.user + times.nice + times.sys + times.idle + times.irq;
      return { busy: acc.busy + total - times.idle, total: acc.total + total };
    },
    { busy: 0, total: 0 }
  );
}

/**
 * Estimates CPU package power as utilization × TDP. Utilization is taken
 * from the change in `os.cpus()` counters since the previous read; the
 * first read only records the baseline and reports no reading.
 */
export class CpuPowerReader implements PowerReader {
  readonly device = "cpu";
  private readonly cpus: () => os.CpuInfo[];
  private previous: CpuTotals | null = null;

  constructor(private readonly options: CpuPowerReaderOptions) {
    this.cpus = options.cpus ?? os.cpus;
  }

  async read(): Promise<number | null> {
    const cpus = this.cpus();
    if (!cpus.length) {
      return null;
    }
    const current = totals(cpus);
    const previous = this.previous;
    this.previous = current;
    if (!previous) {
      return null;
    }

    const total = current.total - previous.total;
    if (total <= 0) {
      return 0;
    }
    const utilization = Math.min(1, Math.max(0, (current.busy - previous.busy) / total));
    return utilization * this.options.tdpW;
  }
}
