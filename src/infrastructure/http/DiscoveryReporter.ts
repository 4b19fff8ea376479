import fetch from 'node-fetch';
import { DiscoveryError, errorMessage } from '../../core/errors.js';

export interface DiscoveryPayload {
  disk: string;
  mgmt_nic: string;
}

export interface IDiscoveryReporter {
  report(payload: DiscoveryPayload): Promise<void>;
}

/**
 * Posts discovery results to the configuration endpoint. One attempt, no retries.
 */
export class DiscoveryReporter implements IDiscoveryReporter {
  constructor(
    private callbackUrl: string,
    private timeoutMs: number = 10000
  ) {}

  async report(payload: DiscoveryPayload): Promise<void> {
    let status: number;
    let body: string;
    try {
      const res = await fetch(this.callbackUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeout: this.timeoutMs,
      });
      status = res.status;
      body = await res.text();
    } catch (error) {
      throw new DiscoveryError(
        'callback-failed',
        `Could not reach ${this.callbackUrl}: ${errorMessage(error)}`
      );
    }

    if (status !== 200) {
      throw new DiscoveryError(
        'callback-failed',
        `Configuration endpoint answered HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`
      );
    }
  }
}
