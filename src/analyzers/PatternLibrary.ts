/**
 * PATTERN LIBRARY
 *
 * Compiled, versioned detection rules shared by every detector.
 * Loaded once at startup, frozen, and handed around by reference, so any
 * number of concurrent evaluations can read it.
 *
 * Source of truth: src/config/patterns.json
 */

import { z } from 'zod';
import defaultPatterns from '../config/patterns.json';
import { ConfigurationError } from '../domain/errors/SecurityErrors';
import { createLogger } from '../services/Logger';

const logger = createLogger('PatternLibrary');

// Ordered from least to most severe; a later family overrides an earlier one.
export const TOXICITY_FAMILIES = ['insult', 'harassment', 'threat', 'hate_speech'] as const;
export type ToxicityFamily = (typeof TOXICITY_FAMILIES)[number];

const PatternSourceSchema = z.object({
  version: z.string().min(1),
  toxicity: z.object({
    insult: z.array(z.string().min(1)),
    harassment: z.array(z.string().min(1)),
    threat: z.array(z.string().min(1)),
    hate_speech: z.array(z.string().min(1)),
  }),
  promotional: z.array(z.string().min(1)),
  nsfw: z.array(z.string().min(1)),
  distress: z.array(z.string().min(1)),
  phishing: z.object({
    keywords: z.array(z.string().min(1)),
    urgency: z.array(z.string().min(1)),
    scamPatterns: z.array(z.string().min(1)),
  }),
  links: z.object({
    blacklist: z.array(z.string().min(1)),
    shorteners: z.array(z.string().min(1)),
    suspiciousTlds: z.array(z.string().startsWith('.')),
    trusted: z.array(z.string().min(1)),
    brands: z.array(
      z.object({
        name: z.string().min(1),
        official: z.array(z.string().min(1)).min(1),
      })
    ),
  }),
});

export type PatternSource = z.infer<typeof PatternSourceSchema>;

export interface ToxicityMatch {
  family: ToxicityFamily;
  matchedFamilies: ToxicityFamily[];
}

export interface PhishingScore {
  score: number;
  matched: string[];
}

export type DomainFlag = 'blacklisted' | 'shortener' | 'suspicious_tld' | 'impersonation';

interface BrandRule {
  readonly name: string;
  readonly official: readonly string[];
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build one case-insensitive, word-bounded alternation out of plain phrases.
 */
function keywordRegex(phrases: readonly string[]): RegExp | null {
  if (phrases.length === 0) return null;
  const body = phrases.map(p => escapeRegex(p.toLowerCase()).replace(/\s+/g, '\\s+')).join('|');
  return new RegExp(`\\b(?:${body})\\b`, 'i');
}

function compile(source: string, where: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new ConfigurationError(`Invalid pattern in ${where}`, [
      `${source}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
}

function matchesDomain(domain: string, entry: string): boolean {
  return domain === entry || domain.endsWith(`.${entry}`);
}

export class PatternLibrary {
  readonly version: string;

  private readonly toxicity: ReadonlyArray<{ family: ToxicityFamily; patterns: readonly RegExp[] }>;
  private readonly promotional: readonly string[];
  private readonly nsfwRegex: RegExp | null;
  private readonly distressRegex: RegExp | null;
  private readonly phishingKeywords: readonly string[];
  private readonly urgencyWords: ReadonlyArray<{ word: string; regex: RegExp }>;
  private readonly scamPatterns: readonly RegExp[];
  private readonly blacklist: readonly string[];
  private readonly shorteners: readonly string[];
  private readonly suspiciousTlds: readonly string[];
  private readonly trusted: readonly string[];
  private readonly brands: readonly BrandRule[];

  private constructor(source: PatternSource) {
    this.version = source.version;

    this.toxicity = TOXICITY_FAMILIES.map(family => ({
      family,
      patterns: Object.freeze(source.toxicity[family].map(p => compile(p, `toxicity.${family}`))),
    }));

    this.promotional = Object.freeze(source.promotional.map(k => k.toLowerCase()));
    this.nsfwRegex = keywordRegex(source.nsfw);
    this.distressRegex = keywordRegex(source.distress);
    this.phishingKeywords = Object.freeze(source.phishing.keywords.map(k => k.toLowerCase()));
    this.urgencyWords = Object.freeze(
      source.phishing.urgency.map(word => ({ word: word.toLowerCase(), regex: compile(`\\b${escapeRegex(word)}\\b`, 'phishing.urgency') }))
    );
    this.scamPatterns = Object.freeze(source.phishing.scamPatterns.map(p => compile(p, 'phishing.scamPatterns')));

    const lower = (list: string[]) => Object.freeze(list.map(d => d.toLowerCase()));
    this.blacklist = lower(source.links.blacklist);
    this.shorteners = lower(source.links.shorteners);
    this.suspiciousTlds = lower(source.links.suspiciousTlds);
    this.trusted = lower(source.links.trusted);
    this.brands = Object.freeze(
      source.links.brands.map(b => Object.freeze({ name: b.name.toLowerCase(), official: lower(b.official) }))
    );

    Object.freeze(this);
  }

  /**
   * Validate and compile a pattern source. Throws ConfigurationError.
   */
  static fromSource(raw: unknown): PatternLibrary {
    const parsed = PatternSourceSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        'Invalid pattern library',
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    const library = new PatternLibrary(parsed.data);
    logger.info(`📚 Pattern library v${library.version} loaded`);
    return library;
  }

  static loadDefault(): PatternLibrary {
    return PatternLibrary.fromSource(defaultPatterns);
  }

  /**
   * Highest toxicity family the content hits, or null.
   */
  matchToxicity(content: string): ToxicityMatch | null {
    const matchedFamilies: ToxicityFamily[] = [];
    for (const { family, patterns } of this.toxicity) {
      if (patterns.some(p => p.test(content))) {
        matchedFamilies.push(family);
      }
    }
    if (matchedFamilies.length === 0) return null;
    return { family: matchedFamilies[matchedFamilies.length - 1], matchedFamilies };
  }

  /**
   * Promotional keywords contained anywhere in the content, each counted once.
   */
  countPromotional(content: string): number {
    const lowered = content.toLowerCase();
    return this.promotional.filter(keyword => lowered.includes(keyword)).length;
  }

  matchNsfw(content: string): string | null {
    const match = this.nsfwRegex?.exec(content);
    return match ? match[0].toLowerCase() : null;
  }

  matchDistress(content: string): string | null {
    const match = this.distressRegex?.exec(content);
    return match ? match[0].toLowerCase() : null;
  }

  /**
   * +2 per phishing keyword or scam phrase, +1 per urgency word.
   */
  scorePhishing(content: string): PhishingScore {
    const lowered = content.toLowerCase();
    const matched: string[] = [];
    let score = 0;

    for (const keyword of this.phishingKeywords) {
      if (lowered.includes(keyword)) {
        score += 2;
        matched.push(keyword);
      }
    }
    for (const pattern of this.scamPatterns) {
      if (pattern.test(lowered)) {
        score += 2;
        matched.push(`scam:${pattern.source}`);
      }
    }
    for (const { word, regex } of this.urgencyWords) {
      if (regex.test(lowered)) {
        score += 1;
        matched.push(`urgency:${word}`);
      }
    }

    return { score, matched };
  }

  isTrustedDomain(domain: string): boolean {
    return this.trusted.some(entry => matchesDomain(domain, entry));
  }

  /**
   * Static reputation flags for a hostname (lowercase, no port).
   */
  classifyDomain(domain: string): DomainFlag[] {
    const flags: DomainFlag[] = [];

    if (this.blacklist.some(entry => matchesDomain(domain, entry))) {
      flags.push('blacklisted');
    }
    if (this.shorteners.some(entry => matchesDomain(domain, entry))) {
      flags.push('shortener');
    }
    if (this.suspiciousTlds.some(tld => domain.endsWith(tld))) {
      flags.push('suspicious_tld');
    }
    for (const brand of this.brands) {
      if (domain.includes(brand.name) && !brand.official.some(entry => matchesDomain(domain, entry))) {
        flags.push('impersonation');
        break;
      }
    }

    return flags;
  }
}
