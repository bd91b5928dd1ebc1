/**
 * ThreatIntelService - optional external domain reputation lookup.
 *
 * Best effort only. Callers race every lookup against their own timer and
 * treat a timeout or an error as "unknown", never as malicious.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from './Logger';

const logger = createLogger('ThreatIntel');

export interface ThreatIntel {
  isMaliciousDomain(domain: string): Promise<boolean>;
}

const VerdictSchema = z.object({
  domain: z.string().optional(),
  malicious: z.boolean(),
});

/**
 * GET {baseUrl}/domains/{domain} -> { "malicious": boolean }
 */
export class HttpThreatIntel implements ThreatIntel {
  private client: AxiosInstance;

  constructor(baseUrl: string, timeoutMs: number, client?: AxiosInstance) {
    this.client =
      client ??
      axios.create({
        baseURL: baseUrl,
        timeout: timeoutMs,
        headers: {
          Accept: 'application/json',
        },
      });
    logger.info(`🛰️ Threat intel lookups enabled (${baseUrl})`);
  }

  async isMaliciousDomain(domain: string): Promise<boolean> {
    const response = await this.client.get<unknown>(`/domains/${encodeURIComponent(domain)}`);
    const verdict = VerdictSchema.parse(response.data);
    return verdict.malicious;
  }
}
