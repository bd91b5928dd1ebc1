/**
 * LinkReputationDetector - static domain rules plus optional threat intel.
 *
 * Static flags (blacklist, shortener, suspicious TLD, brand impersonation)
 * are checked first. Domains with no static flag are looked up through
 * ThreatIntel when one is configured; a lookup that errors or misses
 * `threatIntelTimeoutMs` counts as unknown. Only definite verdicts are cached.
 */

import type { SecurityConfig } from '../config/security.config';
import { ViolationSeverity, ViolationType } from '../types/Security.types';
import type { ViolationFinding } from '../domain/models/Violation';
import type { ThreatIntel } from '../services/ThreatIntelService';
import { createLogger } from '../services/Logger';
import { Clock, LimitedMap } from '../utils/MemoryManager';
import { TIMED_OUT, withTimeout } from '../utils/async';
import type { DomainFlag, PatternLibrary } from './PatternLibrary';
import type { DetectionContext, Detector } from './Detector';

const logger = createLogger('LinkReputation');

const URL_PATTERN = /https?:\/\/[^\s<>()"']+/gi;
const VERDICT_CACHE_SIZE = 5000;

type LinkConfig = Pick<SecurityConfig, 'threatIntelTimeoutMs' | 'threatIntelCacheTtlMs' | 'detectorTimeoutMs'>;

export function extractUrls(content: string, declared: readonly string[] = []): string[] {
  const found = content.match(URL_PATTERN) ?? [];
  return [...new Set([...declared, ...found])];
}

export function hostnameOf(raw: string): string | null {
  try {
    const url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `http://${raw}`);
    const host = url.hostname.toLowerCase().replace(/\.$/, '');
    if (host.length === 0) return null;
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    // Not a URL; nothing to judge
    return null;
  }
}

export class LinkReputationDetector implements Detector {
  readonly name = 'links';
  readonly timeoutMs: number;

  private verdicts: LimitedMap<string, boolean>;

  constructor(
    private readonly patterns: PatternLibrary,
    private readonly config: LinkConfig,
    private readonly threatIntel?: ThreatIntel,
    clock?: Clock
  ) {
    this.verdicts = new LimitedMap<string, boolean>('threat-intel-verdicts', VERDICT_CACHE_SIZE, config.threatIntelCacheTtlMs, clock);
    // The lookup has its own timer; leave room for it inside the detector budget
    this.timeoutMs = threatIntel ? config.threatIntelTimeoutMs + config.detectorTimeoutMs : config.detectorTimeoutMs;
  }

  async detect({ message }: DetectionContext): Promise<ViolationFinding | null> {
    const domains = new Set<string>();
    for (const url of extractUrls(message.content, message.urls)) {
      const host = hostnameOf(url);
      if (host) domains.add(host);
    }
    if (domains.size === 0) return null;

    const flagged: string[] = [];
    const flags = new Set<DomainFlag>();
    const unknown: string[] = [];

    for (const domain of domains) {
      const domainFlags = this.patterns.classifyDomain(domain);
      if (domainFlags.length > 0) {
        flagged.push(domain);
        domainFlags.forEach(flag => flags.add(flag));
      } else if (!this.patterns.isTrustedDomain(domain)) {
        unknown.push(domain);
      }
    }

    if (flagged.length > 0) {
      return this.finding(flagged, [...flags], 'static');
    }

    if (!this.threatIntel || unknown.length === 0) return null;

    const verdicts = await Promise.all(unknown.map(domain => this.lookup(domain)));
    const malicious = unknown.filter((_, i) => verdicts[i] === true);
    if (malicious.length === 0) return null;

    return this.finding(malicious, ['threat_intel'], 'threat_intel');
  }

  /**
   * true / false from the service, null when unknown.
   */
  private async lookup(domain: string): Promise<boolean | null> {
    const cached = this.verdicts.get(domain);
    if (cached !== undefined) return cached;

    const intel = this.threatIntel;
    if (!intel) return null;

    try {
      const verdict = await withTimeout(intel.isMaliciousDomain(domain), this.config.threatIntelTimeoutMs);
      if (verdict === TIMED_OUT) {
        logger.debug(`Threat intel lookup for ${domain} timed out`);
        return null;
      }
      this.verdicts.set(domain, verdict);
      return verdict;
    } catch (error) {
      logger.warn(`Threat intel lookup for ${domain} failed, treating as unknown`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private finding(domains: string[], flags: string[], source: 'static' | 'threat_intel'): ViolationFinding {
    return {
      type: ViolationType.MALICIOUS_LINKS,
      severity: ViolationSeverity.SERIOUS,
      evidence: { domains, flags, source },
    };
  }
}
