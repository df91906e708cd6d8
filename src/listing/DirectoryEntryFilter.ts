/**
 * Directory Entry Filter
 *
 * Decides whether a listing entry is hidden from a client. Rules are keyed by a
 * user-agent pattern; rules sharing a pattern are merged by alternation, and the
 * rule under the empty pattern applies to every client on top of its own rule.
 *
 * All patterns match from position 0 without requiring a full-string match.
 */

import type { HideFileInDirConfig } from '../config/index.js';
import { DEFAULT_HIDE_FILE_IN_DIR_RULES } from '../constants.js';
import { getLogger } from '../logging/index.js';
import { KeyedMutex } from '../util/KeyedMutex.js';

const logger = getLogger('listing');

interface CompiledRule {
  source: string;
  regex: RegExp;
}

function compile(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})`);
}

export class DirectoryEntryFilter {
  readonly enabled: boolean;
  private readonly rules = new Map<string, CompiledRule>();
  private readonly userAgentPatterns = new Map<string, RegExp>();
  private readonly basicRule: CompiledRule | undefined;

  private readonly resolved = new Map<string, CompiledRule>();
  private readonly mutex = new KeyedMutex();

  constructor(config: HideFileInDirConfig) {
    this.enabled = config.enable;

    const merged = new Map<string, string>();
    if (config.enableDefaultRules) {
      for (const [ua, rule] of Object.entries(DEFAULT_HIDE_FILE_IN_DIR_RULES)) {
        merged.set(ua, rule);
      }
    }
    for (const [ua, rule] of Object.entries(config.userRules)) {
      merged.set(ua, DirectoryEntryFilter.mergeRules(merged.get(ua), rule));
    }

    const basic = merged.get('');
    merged.delete('');
    this.basicRule = basic === undefined ? undefined : { source: basic, regex: compile(basic) };

    for (const [ua, rule] of merged) {
      const source = DirectoryEntryFilter.mergeRules(basic, rule);
      this.rules.set(ua, { source, regex: compile(source) });
      this.userAgentPatterns.set(ua, compile(ua));
    }
  }

  static mergeRules(a: string | undefined, b: string): string {
    return a === undefined ? b : `${a}|${b}`;
  }

  /**
   * First rule whose user-agent pattern matches, in insertion order, else the
   * rule for every client. Undefined when neither applies.
   */
  findRuleForUserAgent(userAgent: string): string | undefined {
    return this.findCompiled(userAgent)?.source;
  }

  /**
   * Cached form of findRuleForUserAgent. The cache is populated under a lock;
   * a user agent with no rule is not cached.
   */
  async resolveRuleForUserAgent(userAgent: string): Promise<string | undefined> {
    return (await this.resolveCompiled(userAgent))?.source;
  }

  async shouldHide(userAgent: string, fileName: string): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }

    const rule = await this.resolveCompiled(userAgent);
    if (!rule) {
      return false;
    }

    const hidden = rule.regex.test(fileName);
    logger.debug(`Rule:${rule.source}, File:${fileName}, ${hidden ? 'hide' : 'show'} it`);
    return hidden;
  }

  /** User agents with a cached rule */
  get cachedUserAgentCount(): number {
    return this.resolved.size;
  }

  private resolveCompiled(userAgent: string): Promise<CompiledRule | undefined> {
    return this.mutex.runExclusive(userAgent, () => {
      const cached = this.resolved.get(userAgent);
      if (cached) {
        return cached;
      }

      const rule = this.findCompiled(userAgent);
      if (rule) {
        this.resolved.set(userAgent, rule);
      }
      return rule;
    });
  }

  private findCompiled(userAgent: string): CompiledRule | undefined {
    for (const [ua, pattern] of this.userAgentPatterns) {
      if (pattern.test(userAgent)) {
        return this.rules.get(ua);
      }
    }
    return this.basicRule;
  }
}
