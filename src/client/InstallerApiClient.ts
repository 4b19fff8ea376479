import fetch from 'node-fetch';
import WebSocket from 'ws';
import { encrypt } from 'unixcrypt';
import { z } from 'zod';
import type { ProgressMessage } from '../core/entities/ProgressEvent.js';
import { FieldErrors, ValidationError } from '../core/errors.js';
import { validatePassword } from '../core/validation/validators.js';

/**
 * Hash the root password on the submitting side; the server only ever sees
 * the sha512-crypt string. Weak passwords are refused before hashing.
 */
export function hashRootPassword(password: string): string {
  const check = validatePassword(password);
  if (!check.valid) {
    throw new ValidationError({ rootPassword: check.message ?? 'Invalid password' });
  }
  // unixcrypt defaults to "$6$" with a random salt
  return encrypt(password);
}

export interface NetworkSubmission {
  source: 'dhcp' | 'static';
  cidr?: string;
  gateway?: string;
  dns?: string | string[];
  macFilter?: string;
}

export interface DiskSubmission {
  filesystem?: 'ext4' | 'xfs' | 'zfs' | 'btrfs';
  raid?: string;
  diskList?: string[];
}

export interface IsoRequest {
  fqdn: string;
  email: string;
  country: string;
  timezone: string;
  keyboardLayout: string;
  /** Plain password, hashed locally before submission */
  rootPassword: string;
  network: NetworkSubmission;
  disk?: DiskSubmission;
}

export type CreateIsoResult =
  | { status: true; jobId: string }
  | { status: false; httpStatus: number; error: string; fieldErrors?: FieldErrors };

const JOB_STATUS = z.enum(['pending', 'rendering', 'building', 'complete', 'failed', 'cancelled']);

const CreateIsoResponseSchema = z.union([
  z.object({ status: z.literal(true), jobId: z.string() }),
  z.object({
    status: z.literal(false),
    error: z.string(),
    fieldErrors: z.record(z.string()).optional(),
  }),
]);

const InstallerDataResponseSchema = z.object({
  installerSettings: z.object({
    countries: z.array(z.object({ code: z.string(), name: z.string() })),
    keyboards: z.array(z.object({ code: z.string(), name: z.string() })),
    timezones: z.array(z.string()),
    currentCountry: z.string(),
    currentTimezone: z.string(),
  }),
});

export type InstallerData = z.infer<typeof InstallerDataResponseSchema>['installerSettings'];

const ProgressMessageSchema = z.object({
  data: z.object({
    type: z.enum(['progress', 'status', 'error']),
    progress: z.number().optional(),
    status: JOB_STATUS.optional(),
    message: z.string().optional(),
  }),
});

/**
 * Client for the provisioning server's HTTP and WebSocket API
 */
export class InstallerApiClient {
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async getInstallerData(): Promise<InstallerData> {
    const res = await fetch(`${this.baseUrl}/api/installer/data`);
    if (!res.ok) {
      throw new Error(`HTTP error! status: ${res.status}`);
    }
    return InstallerDataResponseSchema.parse(await res.json()).installerSettings;
  }

  /**
   * Submit a configuration. Throws ValidationError if the password is too weak.
   */
  async createIso(request: IsoRequest): Promise<CreateIsoResult> {
    const { rootPassword, ...rest } = request;
    const body = { ...rest, rootPasswordHash: hashRootPassword(rootPassword) };

    const res = await fetch(`${this.baseUrl}/api/installer/iso`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    });

    const parsed = CreateIsoResponseSchema.parse(await res.json());
    if (parsed.status) {
      return parsed;
    }
    return { status: false, httpStatus: res.status, error: parsed.error, fieldErrors: parsed.fieldErrors };
  }

  async getAnswerFile(jobId: string): Promise<string> {
    const res = await fetch(`${this.baseUrl}/api/answer-file/${encodeURIComponent(jobId)}`);
    if (!res.ok) {
      throw new Error(`HTTP error! status: ${res.status}`);
    }
    return res.text();
  }

  async deleteIso(jobId: string): Promise<void> {
    const res = await fetch(`${this.baseUrl}/api/delete-iso/${encodeURIComponent(jobId)}`, {
      method: 'DELETE',
    });
    if (!res.ok) {
      throw new Error(`HTTP error! status: ${res.status}`);
    }
  }

  /**
   * Stream a job's progress. Ends when the server closes the stream at a
   * terminal state; throws if the server refuses the job.
   */
  async *watchProgress(jobId: string): AsyncGenerator<ProgressMessage> {
    const wsUrl = `${this.baseUrl.replace(/^http/, 'ws')}/api/ws/iso`;
    const ws = new WebSocket(wsUrl);

    const queue: ProgressMessage[] = [];
    const state: { done: boolean; failure: Error | null; wake: (() => void) | null } = {
      done: false,
      failure: null,
      wake: null,
    };
    const notify = () => {
      const wake = state.wake;
      state.wake = null;
      wake?.();
    };

    ws.on('open', () => {
      ws.send(JSON.stringify({ jobId }));
    });
    ws.on('message', (data: WebSocket.RawData) => {
      let payload: unknown;
      try {
        payload = JSON.parse(data.toString());
      } catch {
        state.failure = new Error('Malformed progress message');
        ws.close();
        return;
      }
      const parsed = ProgressMessageSchema.safeParse(payload);
      if (parsed.success) {
        queue.push(parsed.data);
        notify();
      }
    });
    ws.on('close', (code: number, reason: Buffer) => {
      if (code !== 1000 && !state.failure) {
        state.failure = new Error(`Progress stream closed (${code}): ${reason.toString() || 'no reason'}`);
      }
      state.done = true;
      notify();
    });
    ws.on('error', (error: Error) => {
      state.failure = error;
      state.done = true;
      notify();
    });

    try {
      while (true) {
        const next = queue.shift();
        if (next) {
          yield next;
          continue;
        }
        if (state.done) break;
        await new Promise<void>((resolve) => {
          state.wake = resolve;
        });
      }
      if (state.failure) throw state.failure;
    } finally {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close();
      }
    }
  }
}
