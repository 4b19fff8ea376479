import { z } from 'zod';
import type { DiscoveryReport } from '../../core/entities/Hardware.js';

export const DiscoveryReportSchema = z.object({
  disk: z.string().regex(/^\/dev\/[A-Za-z0-9]+$/, 'disk must be a /dev path'),
  mgmt_nic: z.string().regex(/^[A-Za-z0-9._-]{1,15}$/, 'mgmt_nic must be an interface name'),
});

const MAX_REPORTS = 100;

/**
 * Configuration-endpoint side of discovery: keeps the latest reports in memory
 */
export class DiscoveryRegistry {
  private reports: DiscoveryReport[] = [];

  record(disk: string, mgmtNic: string, remoteAddress?: string): DiscoveryReport {
    const report: DiscoveryReport = { disk, mgmtNic, receivedAt: new Date(), remoteAddress };
    this.reports.push(report);
    if (this.reports.length > MAX_REPORTS) {
      this.reports.shift();
    }
    console.log(`[Discovery] Report from ${remoteAddress ?? 'unknown'}: disk=${disk} nic=${mgmtNic}`);
    return report;
  }

  list(): DiscoveryReport[] {
    return [...this.reports];
  }
}
